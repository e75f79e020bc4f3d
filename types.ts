export enum ConeType {
  BLUE = 'BLUE', // Left boundary
  YELLOW = 'YELLOW', // Right boundary
  ORANGE = 'ORANGE', // Start/Finish area
  ORANGE_BIG = 'ORANGE_BIG', // Timekeeping lines
  UNKNOWN = 'UNKNOWN' // Detected but not classified
}

export type MarkerShape = 'circle' | 'square' | 'triangle';

// Plain 2D point, x/y in metres on the track plane
export interface Point2D {
  x: number;
  y: number;
}

export interface MarkerStyle {
  color: string;
  size: number; // Marker diameter in points
  shape: MarkerShape;
}

export interface StyleOverrides {
  color?: string;
  size?: number;
  shape?: MarkerShape;
  detail?: boolean; // Draw the stripe layers on top of the base marker
}

export interface StripeLayer {
  color: string;
  size: number;
}

export interface ConeStyle extends MarkerStyle {
  label: string;
  layers: StripeLayer[]; // Bottom to top
}

export interface TextStyle {
  color: string;
  fontSize: number;
}

export interface LineStyle {
  color: string;
  width: number;
}

export interface LegendEntry {
  label: string;
  style: MarkerStyle;
}

export interface PlotOptions {
  styles?: Partial<Record<ConeType, StyleOverrides>>;
  detail?: boolean;
  legend?: boolean;
  labels?: boolean; // Number each cone with its index in mapping order
}

export interface CameraSettings {
  position: Point2D;
  orientation: number; // Radians, 0 = +x axis
  focalAngle: number; // Radians, full opening angle
  focalLength: number; // Metres
}

// Static car properties; lengths in m, angles in rad, speeds in m/s
export interface CarDimensions {
  backToWheel: number; // Rear end to rear wheel centre
  length: number;
  maxAcceleration: number; // m/s^2
  maxDownsteering: number;
  maxSpeed: number;
  maxSteering: number;
  minSpeed: number;
  tread: number; // Distance between left and right wheels
  wheelBase: number; // Distance between front and rear axles
  wheelLength: number;
  wheelWidth: number;
  width: number;
}

export interface CarStateValues {
  position: Point2D; // Centre of the car
  orientation: number; // Heading, radians
  steering?: number; // Front wheel angle, radians
  speed?: number; // m/s
  acceleration?: number; // m/s^2
  torque?: number; // Nm
}

/**
 * Anything cones can be drawn onto. The caller owns the surface: the
 * library never creates, saves or disposes of one.
 */
export interface DrawingSurface {
  drawMarker(position: Point2D, style: MarkerStyle): void;
  drawText(position: Point2D, text: string, style: TextStyle): void;
  drawPolygon(points: readonly Point2D[], style: LineStyle): void;
  drawLegend(entries: readonly LegendEntry[]): void;
}
