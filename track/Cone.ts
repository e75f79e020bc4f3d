import * as THREE from 'three';
import { ConeType, DrawingSurface, MarkerStyle, Point2D, StyleOverrides } from '../types';
import { CONE_STYLES, VISUALS } from '../constants';
import { InvalidCategoryError, InvalidStyleError } from '../errors';
import { toVector2 } from '../services/mathUtils';

const CONE_TYPES: readonly string[] = Object.values(ConeType);

export const isConeType = (value: unknown): value is ConeType =>
  typeof value === 'string' && CONE_TYPES.includes(value);

/**
 * A single track cone: a position on the track plane and its category.
 *
 * Cones are immutable. `withPosition` and `withCategory` return validated
 * copies instead of changing the instance.
 */
export class Cone {
  private readonly _position: THREE.Vector2;
  private readonly _category: ConeType;

  /**
   * @throws InvalidPositionError if `position` lacks finite `x` and `y`.
   * @throws InvalidCategoryError if `category` is not a {@link ConeType}.
   */
  constructor(position: Point2D, category: ConeType) {
    const vector = toVector2(position);
    if (!isConeType(category)) {
      throw new InvalidCategoryError(category, CONE_TYPES);
    }
    this._position = vector;
    this._category = category;
  }

  get category(): ConeType {
    return this._category;
  }

  /** Copy of the cone position. */
  get position(): THREE.Vector2 {
    return this._position.clone();
  }

  get x(): number {
    return this._position.x;
  }

  get y(): number {
    return this._position.y;
  }

  withPosition(position: Point2D): Cone {
    return new Cone(position, this._category);
  }

  withCategory(category: ConeType): Cone {
    return new Cone(this._position, category);
  }

  distanceTo(other: Cone): number {
    return this._position.distanceTo(other._position);
  }

  /** Same position and same category. */
  equals(other: Cone): boolean {
    return this._category === other._category && this._position.equals(other._position);
  }

  /**
   * Resolve the marker style for this cone. Overrides replace the
   * category defaults field by field.
   */
  style(overrides: StyleOverrides = {}): MarkerStyle {
    const defaults = CONE_STYLES[this._category];
    const style: MarkerStyle = {
      color: overrides.color ?? defaults.color,
      size: overrides.size ?? defaults.size,
      shape: overrides.shape ?? defaults.shape,
    };

    if (!Number.isFinite(style.size) || style.size <= 0) {
      throw new InvalidStyleError(`marker size must be a finite positive number, got ${style.size}`);
    }
    if (style.color.trim() === '') {
      throw new InvalidStyleError('marker color must not be empty');
    }
    return style;
  }

  plot(surface: DrawingSurface, overrides: StyleOverrides = {}): void {
    const base = this.style(overrides);
    surface.drawMarker(this.position, base);

    if (!overrides.detail) return;

    const { layers, size: defaultSize } = CONE_STYLES[this._category];
    if (layers.length === 0) return;

    // Stripes keep their proportions when the base size is overridden
    const scale = base.size / defaultSize;
    for (const layer of layers) {
      surface.drawMarker(this.position, {
        color: layer.color,
        size: layer.size * scale,
        shape: base.shape,
      });
    }

    const top = layers[layers.length - 1];
    surface.drawMarker(this.position, {
      color: VISUALS.STRIPE_WHITE,
      size: (top.size * scale) / 2,
      shape: base.shape,
    });
  }

  toString(): string {
    return `Cone(${this._position.x}, ${this._position.y}, ${this._category})`;
  }
}
