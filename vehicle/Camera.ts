import * as THREE from 'three';
import { CameraSettings, DrawingSurface, LineStyle, Point2D } from '../types';
import { DETECTION } from '../constants';
import { InvalidCameraError } from '../errors';
import { polarOffset, toVector2, triangleContains } from '../services/mathUtils';
import { Cone } from '../track/Cone';
import { ConeArray } from '../track/ConeArray';

type DetectionTriangle = [THREE.Vector2, THREE.Vector2, THREE.Vector2];

/**
 * Onboard camera. Its field of view is approximated by two triangles: one
 * from the lens to the left and right boundary points, and one closing the
 * gap between those boundaries and the point straight ahead at
 * `focalLength`.
 */
export class Camera {
  private _position: THREE.Vector2;
  private _orientation: number;
  private _focalAngle: number;
  private _focalLength: number;
  private area: [DetectionTriangle, DetectionTriangle];
  private _detected: ConeArray[] = [];

  constructor(settings: Partial<CameraSettings> & Pick<CameraSettings, 'position' | 'orientation'>) {
    const {
      position,
      orientation,
      focalAngle = DETECTION.FOCAL_ANGLE,
      focalLength = DETECTION.FOCAL_LENGTH,
    } = settings;

    this._position = toVector2(position);
    this._orientation = checkOrientation(orientation);
    this._focalAngle = checkFocalAngle(focalAngle);
    this._focalLength = checkFocalLength(focalLength);
    this.area = this.computeArea();
  }

  get position(): THREE.Vector2 {
    return this._position.clone();
  }

  set position(value: Point2D) {
    this._position = toVector2(value);
    this.area = this.computeArea();
  }

  get orientation(): number {
    return this._orientation;
  }

  set orientation(value: number) {
    this._orientation = checkOrientation(value);
    this.area = this.computeArea();
  }

  get focalAngle(): number {
    return this._focalAngle;
  }

  set focalAngle(value: number) {
    this._focalAngle = checkFocalAngle(value);
    this.area = this.computeArea();
  }

  get focalLength(): number {
    return this._focalLength;
  }

  set focalLength(value: number) {
    this._focalLength = checkFocalLength(value);
    this.area = this.computeArea();
  }

  /** Result of the last {@link detect} call. */
  get detected(): readonly ConeArray[] {
    return this._detected;
  }

  /** Corners of both detection triangles, lens triangle first. */
  get detectionArea(): [Point2D, Point2D, Point2D][] {
    return this.area.map(([a, b, c]): [Point2D, Point2D, Point2D] => [a.clone(), b.clone(), c.clone()]);
  }

  contains(cone: Cone): boolean {
    const point = cone.position;
    return this.area.some(([a, b, c]) => triangleContains(a, b, c, point));
  }

  /** One array of visible cones per input array, in the same order. */
  detect(...arrays: ConeArray[]): ConeArray[] {
    this._detected = arrays.map(array => new ConeArray([...array].filter(cone => this.contains(cone))));
    return this._detected;
  }

  plot(surface: DrawingSurface, style: LineStyle = DETECTION.AREA_STYLE): void {
    for (const triangle of this.area) {
      surface.drawPolygon(triangle.map(corner => corner.clone()), style);
    }
    surface.drawMarker(this.position, {
      color: style.color,
      size: DETECTION.CAMERA_MARKER_SIZE,
      shape: 'triangle',
    });
  }

  toString(): string {
    return `Camera(x: ${this._position.x}, y: ${this._position.y}, orientation: ${this._orientation}, ` +
      `focalAngle: ${this._focalAngle}, focalLength: ${this._focalLength})`;
  }

  private computeArea(): [DetectionTriangle, DetectionTriangle] {
    const half = this._focalAngle / 2;
    const left = polarOffset(this._position, this._orientation - half, this._focalLength);
    const right = polarOffset(this._position, this._orientation + half, this._focalLength);
    const tip = polarOffset(this._position, this._orientation, this._focalLength);
    return [
      [this._position.clone(), left, right],
      [left.clone(), right.clone(), tip],
    ];
  }
}

const checkOrientation = (value: number): number => {
  if (!Number.isFinite(value)) {
    throw new InvalidCameraError(`orientation must be a finite angle in radians, got ${value}`);
  }
  return value;
};

const checkFocalAngle = (value: number): number => {
  if (!Number.isFinite(value) || value <= 0 || value >= Math.PI) {
    throw new InvalidCameraError(`focalAngle must be within (0, PI) radians, got ${value}`);
  }
  return value;
};

const checkFocalLength = (value: number): number => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidCameraError(`focalLength must be a positive number of metres, got ${value}`);
  }
  return value;
};
