import { CarDimensions, ConeStyle, ConeType, LineStyle, TextStyle } from './types';

export const VISUALS = {
  BLUE_COLOR: '#3b82f6',
  YELLOW_COLOR: '#eab308',
  ORANGE_COLOR: '#f97316',
  UNKNOWN_COLOR: '#9ca3af',
  STRIPE_WHITE: '#ffffff',
  STRIPE_BLACK: '#111827',
  CONE_HEIGHT: 0.5, // Metres, used when building 3D markers
  POINTS_PER_METRE: 20, // Marker size (pt) to world radius (m) ratio
};

// Layer sizes go from the base of the cone up to its tip
export const CONE_STYLES: Record<ConeType, ConeStyle> = {
  [ConeType.BLUE]: {
    label: 'Blue',
    color: VISUALS.BLUE_COLOR,
    size: 10,
    shape: 'circle',
    layers: [
      { color: VISUALS.BLUE_COLOR, size: 8 },
      { color: VISUALS.STRIPE_WHITE, size: 6 },
      { color: VISUALS.BLUE_COLOR, size: 4 },
    ],
  },
  [ConeType.YELLOW]: {
    label: 'Yellow',
    color: VISUALS.YELLOW_COLOR,
    size: 10,
    shape: 'circle',
    layers: [
      { color: VISUALS.YELLOW_COLOR, size: 8 },
      { color: VISUALS.STRIPE_BLACK, size: 6 },
      { color: VISUALS.YELLOW_COLOR, size: 4 },
    ],
  },
  [ConeType.ORANGE]: {
    label: 'Orange',
    color: VISUALS.ORANGE_COLOR,
    size: 10,
    shape: 'circle',
    layers: [
      { color: VISUALS.STRIPE_WHITE, size: 8 },
      { color: VISUALS.ORANGE_COLOR, size: 6 },
      { color: VISUALS.STRIPE_WHITE, size: 4 },
    ],
  },
  [ConeType.ORANGE_BIG]: {
    label: 'Orange (big)',
    color: VISUALS.ORANGE_COLOR,
    size: 14,
    shape: 'circle',
    layers: [
      { color: VISUALS.STRIPE_WHITE, size: 11 },
      { color: VISUALS.ORANGE_COLOR, size: 8 },
      { color: VISUALS.STRIPE_WHITE, size: 5 },
    ],
  },
  [ConeType.UNKNOWN]: {
    label: 'Unknown',
    color: VISUALS.UNKNOWN_COLOR,
    size: 8,
    shape: 'square',
    layers: [],
  },
};

export const DETECTION = {
  FOCAL_ANGLE: Math.PI / 3, // 60 degrees
  FOCAL_LENGTH: 15, // m
  AREA_STYLE: { color: '#22c55e', width: 1 } satisfies LineStyle,
  CAMERA_MARKER_SIZE: 6,
};

// Typical Formula Student car
export const CAR_STRUCTURE: CarDimensions = {
  backToWheel: 0.4,
  length: 2.9,
  maxAcceleration: 10.0, // 0-100kph in <3s
  maxDownsteering: 0.1,
  maxSpeed: 35.0, // ~126 km/h
  maxSteering: 0.45,
  minSpeed: 0.0,
  tread: 1.2,
  wheelBase: 1.53,
  wheelLength: 0.46,
  wheelWidth: 0.2,
  width: 1.4,
};

export const VEHICLE = {
  BODY_STYLE: { color: '#ef4444', width: 2 } satisfies LineStyle,
};

export const LABELS = {
  OFFSET: 0.3, // m, up and to the right of the cone
  TEXT: { color: '#111827', fontSize: 10 } satisfies TextStyle,
};

export const LEGEND = {
  MARGIN: 10, // px
  ROW_HEIGHT: 18, // px
  TEXT: { color: '#111827', fontSize: 12 } satisfies TextStyle,
};
