import { ConeType, DrawingSurface, LegendEntry, PlotOptions } from '../types';
import { CONE_STYLES, LABELS } from '../constants';
import { IndexOutOfRangeError, InvalidElementError } from '../errors';
import { Cone } from './Cone';

// Validate a whole batch before anything is stored
const validateCones = (values: Iterable<unknown>, offset = 0): Cone[] => {
  const cones: Cone[] = [];
  let index = offset;
  for (const value of values) {
    if (!(value instanceof Cone)) {
      throw new InvalidElementError(value, index);
    }
    cones.push(value);
    index++;
  }
  return cones;
};

/**
 * Ordered collection of cones in mapping order. Every element is checked to
 * be a {@link Cone} on the way in; a failed insert leaves the array as it was.
 * Duplicate cones are kept, they stand for repeated detections.
 */
export class ConeArray implements Iterable<Cone> {
  private readonly cones: Cone[];

  constructor(cones: Iterable<Cone> = []) {
    this.cones = validateCones(cones);
  }

  /** Build from untyped input, e.g. values coming from plain JavaScript. */
  static from(values: Iterable<unknown>): ConeArray {
    return new ConeArray(validateCones(values));
  }

  get length(): number {
    return this.cones.length;
  }

  /** Negative indexes count back from the end. */
  at(index: number): Cone {
    const length = this.cones.length;
    if (!Number.isInteger(index) || index >= length || index < -length) {
      throw new IndexOutOfRangeError(index, length);
    }
    return this.cones[index < 0 ? length + index : index];
  }

  [Symbol.iterator](): Iterator<Cone> {
    return this.cones[Symbol.iterator]();
  }

  toArray(): readonly Cone[] {
    return Object.freeze([...this.cones]);
  }

  append(cone: Cone): void {
    this.extend([cone]);
  }

  extend(cones: Iterable<Cone>): void {
    const validated = validateCones(cones, this.cones.length);
    for (const cone of validated) {
      this.cones.push(cone);
    }
  }

  clear(): void {
    this.cones.length = 0;
  }

  filterByCategory(category: ConeType): ConeArray {
    return new ConeArray(this.cones.filter(cone => cone.category === category));
  }

  /**
   * Distinct categories present, in the order they first appear. The result
   * can be iterated any number of times and reflects the array's contents at
   * iteration time.
   */
  categories(): Iterable<ConeType> {
    const cones = this.cones;
    return {
      *[Symbol.iterator]() {
        const seen = new Set<ConeType>();
        for (const cone of cones) {
          if (seen.has(cone.category)) continue;
          seen.add(cone.category);
          yield cone.category;
        }
      },
    };
  }

  countByCategory(): Map<ConeType, number> {
    const counts = new Map<ConeType, number>();
    for (const cone of this.cones) {
      counts.set(cone.category, (counts.get(cone.category) ?? 0) + 1);
    }
    return counts;
  }

  /**
   * Draw every cone in insertion order, so later cones end up on top.
   * A per-category entry in `options.styles` wins over the cone's default
   * style for that category.
   */
  plot(surface: DrawingSurface, options: PlotOptions = {}): void {
    const { styles = {}, detail = false, legend = false, labels = false } = options;

    // Styles depend on the category only: resolve one per category before
    // drawing, so a bad override throws with the surface untouched.
    const entries: LegendEntry[] = [];
    const seen = new Set<ConeType>();
    for (const cone of this.cones) {
      if (seen.has(cone.category)) continue;
      seen.add(cone.category);
      entries.push({
        label: CONE_STYLES[cone.category].label,
        style: cone.style(styles[cone.category]),
      });
    }

    this.cones.forEach((cone, i) => {
      cone.plot(surface, { detail, ...styles[cone.category] });
      if (labels) {
        surface.drawText({ x: cone.x + LABELS.OFFSET, y: cone.y + LABELS.OFFSET }, String(i), LABELS.TEXT);
      }
    });

    if (!legend) return;

    if (entries.length === 0) {
      console.warn('Legend requested for an empty ConeArray; nothing drawn.');
      return;
    }
    surface.drawLegend(entries);
  }

  /** Same length and pairwise equal cones in the same order. */
  equals(other: ConeArray): boolean {
    if (this.cones.length !== other.cones.length) return false;
    return this.cones.every((cone, i) => cone.equals(other.cones[i]));
  }

  toString(): string {
    const noun = this.cones.length === 1 ? 'cone' : 'cones';
    const body = this.cones.map(cone => `  ${cone.toString()}`).join('\n');
    return body
      ? `ConeArray(${this.cones.length} ${noun})\n${body}`
      : `ConeArray(0 cones)`;
  }
}
