export * from './types';
export * from './errors';
export { CAR_STRUCTURE, CONE_STYLES, DETECTION, LABELS, LEGEND, VEHICLE, VISUALS } from './constants';
export { isFinitePoint, toVector2 } from './services/mathUtils';
export { Cone, isConeType } from './track/Cone';
export { ConeArray } from './track/ConeArray';
export { Camera } from './vehicle/Camera';
export { Car, CarState, CarStructure } from './vehicle/Car';
export { SceneSurface } from './surfaces/SceneSurface';
export { CanvasSurface } from './surfaces/CanvasSurface';
export type { CanvasContext, CanvasSurfaceOptions } from './surfaces/CanvasSurface';
