/**
 * Unit tests for camera field-of-view detection
 */

import { describe, it, expect } from '@jest/globals';
import { Camera } from '../vehicle/Camera';
import { Cone } from '../track/Cone';
import { ConeArray } from '../track/ConeArray';
import { ConeType } from '../types';
import { InvalidCameraError, InvalidPositionError } from '../errors';
import { RecordingSurface } from './helpers/RecordingSurface';

// Facing +x with a 60 degree opening: boundaries at (8.66, -5) and (8.66, 5), tip at (10, 0)
const makeCamera = () => new Camera({
  position: { x: 0, y: 0 },
  orientation: 0,
  focalAngle: Math.PI / 3,
  focalLength: 10,
});

const blue = (x: number, y: number) => new Cone({ x, y }, ConeType.BLUE);
const yellow = (x: number, y: number) => new Cone({ x, y }, ConeType.YELLOW);

describe('Camera.contains', () => {
  it('sees cones inside the lens triangle', () => {
    const camera = makeCamera();
    expect(camera.contains(blue(5, 0))).toBe(true);
    expect(camera.contains(blue(5, 2))).toBe(true);
  });

  it('sees cones between the boundary chord and the tip', () => {
    expect(makeCamera().contains(blue(9.5, 0))).toBe(true);
  });

  it('does not see cones outside the field of view', () => {
    const camera = makeCamera();
    expect(camera.contains(blue(-1, 0))).toBe(false); // behind
    expect(camera.contains(blue(5, 4))).toBe(false); // too far sideways
    expect(camera.contains(blue(11, 0))).toBe(false); // beyond focal length
  });

  it('follows orientation changes', () => {
    const camera = makeCamera();
    camera.orientation = Math.PI / 2;

    expect(camera.contains(blue(0, 5))).toBe(true);
    expect(camera.contains(blue(5, 0))).toBe(false);
  });

  it('follows position changes', () => {
    const camera = makeCamera();
    camera.position = { x: 20, y: 0 };

    expect(camera.contains(blue(25, 0))).toBe(true);
    expect(camera.contains(blue(5, 0))).toBe(false);
  });
});

describe('Camera.detect', () => {
  it('returns one filtered array per input, keeping order', () => {
    const camera = makeCamera();
    const left = new ConeArray([blue(5, 2), blue(-1, 0), blue(9.5, 0)]);
    const right = new ConeArray([yellow(5, -2), yellow(5, -4)]);

    const [seenLeft, seenRight] = camera.detect(left, right);

    expect(seenLeft.equals(new ConeArray([blue(5, 2), blue(9.5, 0)]))).toBe(true);
    expect(seenRight.equals(new ConeArray([yellow(5, -2)]))).toBe(true);
    expect(camera.detected).toHaveLength(2);
    expect(left.length).toBe(3);
  });

  it('returns an empty list without arrays', () => {
    const camera = makeCamera();
    expect(camera.detect()).toEqual([]);
    expect(camera.detected).toEqual([]);
  });
});

describe('Camera settings', () => {
  it('uses default focal parameters', () => {
    const camera = new Camera({ position: { x: 0, y: 0 }, orientation: 0 });
    expect(camera.focalAngle).toBeCloseTo(Math.PI / 3, 10);
    expect(camera.focalLength).toBe(15);
  });

  it('rejects invalid settings', () => {
    const position = { x: 0, y: 0 };
    expect(() => new Camera({ position, orientation: Number.NaN })).toThrow(InvalidCameraError);
    expect(() => new Camera({ position, orientation: 0, focalAngle: 0 })).toThrow(InvalidCameraError);
    expect(() => new Camera({ position, orientation: 0, focalAngle: Math.PI })).toThrow(InvalidCameraError);
    expect(() => new Camera({ position, orientation: 0, focalLength: -1 })).toThrow(InvalidCameraError);
    expect(() => new Camera({ position: { x: Number.NaN, y: 0 }, orientation: 0 })).toThrow(InvalidPositionError);
  });

  it('keeps its previous value when a setter rejects', () => {
    const camera = makeCamera();
    expect(() => { camera.focalLength = 0; }).toThrow(InvalidCameraError);
    expect(camera.focalLength).toBe(10);
    expect(camera.contains(blue(9.5, 0))).toBe(true);
  });

  it('formats its settings', () => {
    const camera = new Camera({ position: { x: 1, y: 2 }, orientation: 0, focalAngle: 1, focalLength: 10 });
    expect(camera.toString()).toBe('Camera(x: 1, y: 2, orientation: 0, focalAngle: 1, focalLength: 10)');
  });
});

describe('Camera.plot', () => {
  it('draws both detection triangles and the camera marker', () => {
    const surface = new RecordingSurface();
    makeCamera().plot(surface);

    expect(surface.calls.map(call => call.kind)).toEqual(['polygon', 'polygon', 'marker']);

    const first = surface.calls[0];
    if (first.kind !== 'polygon') throw new Error('expected a polygon');
    expect(first.style).toEqual({ color: '#22c55e', width: 1 });
    expect(first.points).toHaveLength(3);
    expect(first.points[0]).toEqual({ x: 0, y: 0 });
    expect(first.points[1].x).toBeCloseTo(8.660254, 5);
    expect(first.points[1].y).toBeCloseTo(-5, 10);
    expect(first.points[2].y).toBeCloseTo(5, 10);

    expect(surface.markers()).toEqual([
      { position: { x: 0, y: 0 }, style: { color: '#22c55e', size: 6, shape: 'triangle' } },
    ]);
  });
});
