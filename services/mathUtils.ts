import * as THREE from 'three';
import { Point2D } from '../types';
import { InvalidPositionError } from '../errors';

// --- Helper: Finite 2D point check ---
export const isFinitePoint = (value: unknown): value is Point2D => {
  if (typeof value !== 'object' || value === null) return false;
  if (!('x' in value) || !('y' in value)) return false;
  const { x, y } = value;
  return typeof x === 'number' && typeof y === 'number' && Number.isFinite(x) && Number.isFinite(y);
};

// --- Helper: Validated copy into a Vector2 ---
// Callers never keep a reference to the object they passed in.
export const toVector2 = (value: unknown): THREE.Vector2 => {
  if (!isFinitePoint(value)) {
    throw new InvalidPositionError(value);
  }
  return new THREE.Vector2(value.x, value.y);
};

// --- Helper: Track plane (x, y) to world space ---
// The track lies on the XZ plane; world Y is elevation.
export const toGroundPlane = (point: Point2D, elevation = 0): THREE.Vector3 =>
  new THREE.Vector3(point.x, elevation, point.y);

// --- Helper: Point at `distance` from `origin` along `angle` (radians) ---
export const polarOffset = (origin: Point2D, angle: number, distance: number): THREE.Vector2 =>
  new THREE.Vector2(
    origin.x + Math.cos(angle) * distance,
    origin.y + Math.sin(angle) * distance
  );

// --- Helper: 2D point-in-triangle (edges inclusive) ---
export const triangleContains = (a: Point2D, b: Point2D, c: Point2D, point: Point2D): boolean => {
  const triangle = new THREE.Triangle(
    new THREE.Vector3(a.x, a.y, 0),
    new THREE.Vector3(b.x, b.y, 0),
    new THREE.Vector3(c.x, c.y, 0)
  );
  return triangle.containsPoint(new THREE.Vector3(point.x, point.y, 0));
};
