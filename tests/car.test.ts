/**
 * Unit tests for the car model and its onboard camera
 */

import { describe, it, expect } from '@jest/globals';
import { Car, CarState, CarStructure } from '../vehicle/Car';
import { Camera } from '../vehicle/Camera';
import { Cone } from '../track/Cone';
import { ConeArray } from '../track/ConeArray';
import { CAR_STRUCTURE } from '../constants';
import { ConeType } from '../types';
import { InvalidPositionError, InvalidVehicleError } from '../errors';
import { RecordingSurface } from './helpers/RecordingSurface';

// What plain JavaScript callers see: any key, any value
interface UntypedStructure {
  get(key: string): number;
  set(key: string, value: unknown): void;
}

const makeCamera = () => new Camera({ position: { x: 0, y: 0 }, orientation: 0, focalLength: 10 });

describe('CarStructure', () => {
  it('starts from the default dimensions', () => {
    const structure = new CarStructure();
    expect(structure.get('maxSpeed')).toBe(35);
    expect(structure.toJSON()).toEqual(CAR_STRUCTURE);
  });

  it('takes overrides at construction', () => {
    const structure = new CarStructure({ length: 4, width: 2 });
    expect(structure.get('length')).toBe(4);
    expect(structure.get('width')).toBe(2);
    expect(structure.get('tread')).toBe(1.2);
  });

  it('checks values on assignment', () => {
    const structure = new CarStructure();
    structure.set('width', 1.6);
    expect(structure.get('width')).toBe(1.6);

    expect(() => structure.set('width', -1)).toThrow(InvalidVehicleError);
    expect(() => structure.set('width', Number.NaN)).toThrow('width must be a finite number, got NaN');
    expect(structure.get('width')).toBe(1.6);
  });

  it('rejects unknown keys and non-numeric values from untyped callers', () => {
    const untyped: UntypedStructure = new CarStructure();

    expect(() => untyped.set('wings', 1)).toThrow('invalid attribute: "wings". Possible values are: backToWheel,');
    expect(() => untyped.get('wings')).toThrow(InvalidVehicleError);
    expect(() => untyped.set('width', '2')).toThrow('width must be a finite number, got 2');
  });

  it('updates all values or none', () => {
    const structure = new CarStructure();

    expect(() => structure.update({ length: 4, width: -1 })).toThrow(InvalidVehicleError);
    expect(structure.get('length')).toBe(2.9);

    structure.update({ length: 4, width: 2 });
    expect(structure.get('length')).toBe(4);
    expect(structure.get('width')).toBe(2);
  });

  it('hands out a copy from toJSON', () => {
    const structure = new CarStructure();
    const dimensions = structure.toJSON();
    dimensions.length = 10;
    expect(structure.get('length')).toBe(2.9);
  });
});

describe('CarState', () => {
  it('defaults the dynamic values to zero', () => {
    const state = new CarState({ position: { x: 1, y: 2 }, orientation: 0.5 });
    expect(state.position.toArray()).toEqual([1, 2]);
    expect([state.orientation, state.steering, state.speed, state.acceleration, state.torque]).toEqual([0.5, 0, 0, 0, 0]);
  });

  it('rejects bad values', () => {
    expect(() => new CarState({ position: { x: Number.NaN, y: 0 }, orientation: 0 })).toThrow(InvalidPositionError);
    expect(() => new CarState({ position: { x: 0, y: 0 }, orientation: 0, speed: Number.POSITIVE_INFINITY }))
      .toThrow(InvalidVehicleError);
  });

  it('builds the next state with `with`', () => {
    const state = new CarState({ position: { x: 0, y: 0 }, orientation: 0, speed: 5 });
    const next = state.with({ position: { x: 1, y: 0 }, speed: 6 });

    expect(next.position.toArray()).toEqual([1, 0]);
    expect(next.speed).toBe(6);
    expect(next.orientation).toBe(0);
    expect(state.speed).toBe(5);
  });
});

describe('Car', () => {
  it('mounts the camera at the car centre, facing forward', () => {
    const camera = makeCamera();
    const car = new Car({
      state: new CarState({ position: { x: 5, y: 5 }, orientation: Math.PI / 2 }),
      camera,
    });

    expect(car.camera).toBe(camera);
    expect(camera.position.toArray()).toEqual([5, 5]);
    expect(camera.orientation).toBe(Math.PI / 2);
  });

  it('moves the camera with each new state', () => {
    const car = new Car({ state: new CarState({ position: { x: 0, y: 0 }, orientation: 0 }), camera: makeCamera() });
    const cones = new ConeArray([new Cone({ x: 25, y: 0 }, ConeType.BLUE)]);

    expect(car.detect(cones)[0].length).toBe(0);

    car.state = car.state.with({ position: { x: 20, y: 0 } });
    expect(car.detect(cones)[0].length).toBe(1);
  });

  it('cannot detect without a camera', () => {
    const car = new Car({ state: new CarState({ position: { x: 0, y: 0 }, orientation: 0 }) });
    expect(car.camera).toBeNull();
    expect(() => car.detect(new ConeArray())).toThrow('car has no camera to detect cones with');
  });

  it('enforces the structure limits and keeps the last valid state', () => {
    const car = new Car({ state: new CarState({ position: { x: 0, y: 0 }, orientation: 0, speed: 10 }) });

    expect(() => { car.state = car.state.with({ steering: 0.5 }); }).toThrow('steering 0.5 exceeds the maximum of 0.45');
    expect(() => { car.state = car.state.with({ speed: 40 }); }).toThrow('speed 40 is outside [0, 35]');
    expect(() => { car.state = car.state.with({ speed: -1 }); }).toThrow(InvalidVehicleError);
    expect(car.state.speed).toBe(10);
  });

  it('rejects a state that is not a CarState', () => {
    expect(() => Reflect.construct(Car, [{ state: { position: { x: 0, y: 0 }, orientation: 0 } }]))
      .toThrow('state must be a CarState instance');
  });

  it('outlines its body from the structure', () => {
    const car = new Car({
      state: new CarState({ position: { x: 0, y: 0 }, orientation: 0 }),
      structure: new CarStructure({ length: 4, width: 2 }),
    });

    const corners = car.footprint();
    const expected = [[2, 1], [2, -1], [-2, -1], [-2, 1]];
    expect(corners).toHaveLength(4);
    corners.forEach((corner, i) => {
      expect(corner.x).toBeCloseTo(expected[i][0], 10);
      expect(corner.y).toBeCloseTo(expected[i][1], 10);
    });
  });

  it('plots its body, then its camera', () => {
    const surface = new RecordingSurface();
    new Car({ state: new CarState({ position: { x: 0, y: 0 }, orientation: 0 }), camera: makeCamera() }).plot(surface);

    expect(surface.calls.map(call => call.kind)).toEqual(['polygon', 'polygon', 'polygon', 'marker']);
    const body = surface.calls[0];
    if (body.kind !== 'polygon') throw new Error('expected a polygon');
    expect(body.style).toEqual({ color: '#ef4444', width: 2 });
    expect(body.points).toHaveLength(4);
  });
});
