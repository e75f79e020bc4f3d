import * as THREE from 'three';
import { DrawingSurface, LegendEntry, LineStyle, MarkerStyle, Point2D, TextStyle } from '../types';
import { VISUALS } from '../constants';
import { toGroundPlane } from '../services/mathUtils';

const LINE_Y_OFFSET = 0.05; // Lift above the ground to avoid z-fighting

/**
 * Builds three.js objects for everything drawn on it. Add `group` to a
 * scene to display them; the caller disposes of geometries and materials.
 */
export class SceneSurface implements DrawingSurface {
  readonly group: THREE.Group;

  constructor(group: THREE.Group = new THREE.Group()) {
    this.group = group;
  }

  drawMarker(position: Point2D, style: MarkerStyle): void {
    const radius = style.size / VISUALS.POINTS_PER_METRE / 2;
    const height = VISUALS.CONE_HEIGHT;

    const geometry = style.shape === 'square'
      ? new THREE.BoxGeometry(radius * 2, radius * 2, radius * 2)
      : new THREE.ConeGeometry(radius, height, style.shape === 'triangle' ? 3 : 32);
    const material = new THREE.MeshStandardMaterial({ color: style.color, roughness: 0.3 });

    const mesh = new THREE.Mesh(geometry, material);
    mesh.name = 'marker';
    mesh.position.copy(toGroundPlane(position, style.shape === 'square' ? radius : height / 2));
    mesh.castShadow = true;
    this.group.add(mesh);
  }

  // three.js has no text primitive; labels are kept as data for the caller
  drawText(position: Point2D, text: string, style: TextStyle): void {
    const label = new THREE.Object3D();
    label.name = 'text';
    label.position.copy(toGroundPlane(position));
    label.userData = { text, color: style.color, fontSize: style.fontSize };
    this.group.add(label);
  }

  drawPolygon(points: readonly Point2D[], style: LineStyle): void {
    const geometry = new THREE.BufferGeometry().setFromPoints(
      points.map(point => toGroundPlane(point, LINE_Y_OFFSET))
    );
    const material = new THREE.LineBasicMaterial({ color: style.color, linewidth: style.width });
    const loop = new THREE.LineLoop(geometry, material);
    loop.name = 'polygon';
    this.group.add(loop);
  }

  drawLegend(entries: readonly LegendEntry[]): void {
    const legend = new THREE.Object3D();
    legend.name = 'legend';
    legend.userData = { entries: entries.map(entry => ({ label: entry.label, style: { ...entry.style } })) };
    this.group.add(legend);
  }
}
