import * as THREE from 'three';
import { CarDimensions, CarStateValues, DrawingSurface, LineStyle } from '../types';
import { CAR_STRUCTURE, VEHICLE } from '../constants';
import { InvalidVehicleError } from '../errors';
import { polarOffset, toVector2 } from '../services/mathUtils';
import { ConeArray } from '../track/ConeArray';
import { Camera } from './Camera';

const STRUCTURE_KEYS: readonly (keyof CarDimensions)[] = [
  'backToWheel',
  'length',
  'maxAcceleration',
  'maxDownsteering',
  'maxSpeed',
  'maxSteering',
  'minSpeed',
  'tread',
  'wheelBase',
  'wheelLength',
  'wheelWidth',
  'width',
];

const isStructureKey = (key: string): key is keyof CarDimensions =>
  STRUCTURE_KEYS.some(known => known === key);

const checkFinite = (name: string, value: unknown): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidVehicleError(`${name} must be a finite number, got ${String(value)}`);
  }
  return value;
};

const checkDimension = (name: string, value: unknown): number => {
  const checked = checkFinite(name, value);
  if (checked < 0) {
    throw new InvalidVehicleError(`${name} must not be negative, got ${checked}`);
  }
  return checked;
};

const unknownKey = (key: string) =>
  new InvalidVehicleError(
    `invalid attribute: "${key}". Possible values are: ${STRUCTURE_KEYS.join(', ')}.`
  );

/**
 * Dynamic state of the car at one instant. Immutable; use `with` to get
 * the next state.
 */
export class CarState {
  private readonly _position: THREE.Vector2;
  readonly orientation: number;
  readonly steering: number;
  readonly speed: number;
  readonly acceleration: number;
  readonly torque: number;

  constructor(values: CarStateValues) {
    this._position = toVector2(values.position);
    this.orientation = checkFinite('orientation', values.orientation);
    this.steering = checkFinite('steering', values.steering ?? 0);
    this.speed = checkFinite('speed', values.speed ?? 0);
    this.acceleration = checkFinite('acceleration', values.acceleration ?? 0);
    this.torque = checkFinite('torque', values.torque ?? 0);
  }

  get position(): THREE.Vector2 {
    return this._position.clone();
  }

  with(changes: Partial<CarStateValues>): CarState {
    return new CarState({
      position: changes.position ?? this._position,
      orientation: changes.orientation ?? this.orientation,
      steering: changes.steering ?? this.steering,
      speed: changes.speed ?? this.speed,
      acceleration: changes.acceleration ?? this.acceleration,
      torque: changes.torque ?? this.torque,
    });
  }
}

/**
 * Static properties of the car. Every value is checked on assignment;
 * unknown keys and non-numeric or negative values are rejected.
 */
export class CarStructure {
  private readonly values: CarDimensions;

  constructor(values: Partial<CarDimensions> = {}) {
    this.values = { ...CAR_STRUCTURE };
    this.update(values);
  }

  get(key: keyof CarDimensions): number {
    if (!isStructureKey(key)) throw unknownKey(key);
    return this.values[key];
  }

  set(key: keyof CarDimensions, value: number): void {
    if (!isStructureKey(key)) throw unknownKey(key);
    this.values[key] = checkDimension(key, value);
  }

  /** Assigns all values or none. */
  update(values: Partial<CarDimensions>): void {
    const checked: [keyof CarDimensions, number][] = [];
    for (const key of Object.keys(values)) {
      if (!isStructureKey(key)) throw unknownKey(key);
      const value = values[key];
      if (value === undefined) continue;
      checked.push([key, checkDimension(key, value)]);
    }
    for (const [key, value] of checked) {
      this.values[key] = value;
    }
  }

  toJSON(): CarDimensions {
    return { ...this.values };
  }
}

export interface CarParts {
  state: CarState;
  structure?: CarStructure;
  camera?: Camera;
}

/**
 * A car on track: its structure, its current state and, optionally, an
 * onboard camera. The camera is mounted at the car centre and turns with it.
 */
export class Car {
  readonly structure: CarStructure;
  readonly camera: Camera | null;
  private _state: CarState;

  constructor({ state, structure = new CarStructure(), camera }: CarParts) {
    this.structure = structure;
    this.camera = camera ?? null;
    this._state = this.checkState(state);
    this.mountCamera();
  }

  get state(): CarState {
    return this._state;
  }

  /**
   * @throws InvalidVehicleError if steering or speed exceed the structure's
   * limits; the previous state is kept.
   */
  set state(value: CarState) {
    this._state = this.checkState(value);
    this.mountCamera();
  }

  detect(...arrays: ConeArray[]): ConeArray[] {
    if (!this.camera) {
      throw new InvalidVehicleError('car has no camera to detect cones with');
    }
    return this.camera.detect(...arrays);
  }

  /** Body outline: front-left, front-right, rear-right, rear-left. */
  footprint(): THREE.Vector2[] {
    const centre = this._state.position;
    const heading = this._state.orientation;
    const halfLength = this.structure.get('length') / 2;
    const halfWidth = this.structure.get('width') / 2;

    const front = polarOffset(centre, heading, halfLength);
    const rear = polarOffset(centre, heading + Math.PI, halfLength);
    return [
      polarOffset(front, heading + Math.PI / 2, halfWidth),
      polarOffset(front, heading - Math.PI / 2, halfWidth),
      polarOffset(rear, heading - Math.PI / 2, halfWidth),
      polarOffset(rear, heading + Math.PI / 2, halfWidth),
    ];
  }

  plot(surface: DrawingSurface, style: LineStyle = VEHICLE.BODY_STYLE): void {
    surface.drawPolygon(this.footprint(), style);
    this.camera?.plot(surface);
  }

  private checkState(state: CarState): CarState {
    if (!(state instanceof CarState)) {
      throw new InvalidVehicleError('state must be a CarState instance');
    }

    const maxSteering = this.structure.get('maxSteering');
    if (Math.abs(state.steering) > maxSteering) {
      throw new InvalidVehicleError(`steering ${state.steering} exceeds the maximum of ${maxSteering}`);
    }

    const minSpeed = this.structure.get('minSpeed');
    const maxSpeed = this.structure.get('maxSpeed');
    if (state.speed < minSpeed || state.speed > maxSpeed) {
      throw new InvalidVehicleError(`speed ${state.speed} is outside [${minSpeed}, ${maxSpeed}]`);
    }
    return state;
  }

  private mountCamera(): void {
    if (!this.camera) return;
    this.camera.position = this._state.position;
    this.camera.orientation = this._state.orientation;
  }
}
