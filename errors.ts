export class InvalidPositionError extends Error {
  constructor(value: unknown) {
    super(`position must have finite numeric x and y, got ${describeValue(value)}`);
    this.name = 'InvalidPositionError';
  }
}

export class InvalidCategoryError extends Error {
  constructor(value: unknown, allowed: readonly string[]) {
    super(`category must be one of ${allowed.join(', ')}, got ${describeValue(value)}`);
    this.name = 'InvalidCategoryError';
  }
}

export class InvalidStyleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStyleError';
  }
}

export class InvalidCameraError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCameraError';
  }
}

export class InvalidVehicleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidVehicleError';
  }
}

export class InvalidElementError extends TypeError {
  readonly index: number;

  constructor(value: unknown, index: number) {
    super(`element ${index} is not a Cone instance, got ${describeValue(value)}`);
    this.name = 'InvalidElementError';
    this.index = index;
  }
}

export class IndexOutOfRangeError extends RangeError {
  constructor(index: number, length: number) {
    super(`index ${index} out of range for ConeArray of length ${length}`);
    this.name = 'IndexOutOfRangeError';
  }
}

const describeValue = (value: unknown): string => {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  if (typeof value === 'string') return `"${value}"`;
  return String(value);
};
