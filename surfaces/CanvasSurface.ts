import { DrawingSurface, LegendEntry, LineStyle, MarkerStyle, Point2D, TextStyle } from '../types';
import { LEGEND } from '../constants';

// The subset of the 2D canvas API the surface draws with
export type CanvasContext = Pick<
  CanvasRenderingContext2D,
  | 'beginPath'
  | 'closePath'
  | 'moveTo'
  | 'lineTo'
  | 'arc'
  | 'fill'
  | 'stroke'
  | 'fillRect'
  | 'fillText'
  | 'fillStyle'
  | 'strokeStyle'
  | 'lineWidth'
  | 'font'
>;

export interface CanvasSurfaceOptions {
  scale?: number; // Pixels per metre
  origin?: Point2D; // Canvas pixel where world (0, 0) lands
}

/**
 * Draws onto a 2D canvas context. World y points up, canvas y points down,
 * so y is flipped on the way through.
 */
export class CanvasSurface implements DrawingSurface {
  private readonly ctx: CanvasContext;
  private readonly scale: number;
  private readonly origin: Point2D;

  constructor(ctx: CanvasContext, options: CanvasSurfaceOptions = {}) {
    this.ctx = ctx;
    this.scale = options.scale ?? 10;
    this.origin = options.origin ?? { x: 0, y: 0 };
  }

  toCanvas(point: Point2D): Point2D {
    return {
      x: this.origin.x + point.x * this.scale,
      y: this.origin.y - point.y * this.scale,
    };
  }

  drawMarker(position: Point2D, style: MarkerStyle): void {
    const { x, y } = this.toCanvas(position);
    this.fillShape(x, y, style);
  }

  drawText(position: Point2D, text: string, style: TextStyle): void {
    const { x, y } = this.toCanvas(position);
    this.ctx.fillStyle = style.color;
    this.ctx.font = `${style.fontSize}px monospace`;
    this.ctx.fillText(text, x, y);
  }

  drawPolygon(points: readonly Point2D[], style: LineStyle): void {
    if (!points.length) return;

    this.ctx.strokeStyle = style.color;
    this.ctx.lineWidth = style.width;
    this.ctx.beginPath();
    points.forEach((point, i) => {
      const { x, y } = this.toCanvas(point);
      i === 0 ? this.ctx.moveTo(x, y) : this.ctx.lineTo(x, y);
    });
    this.ctx.closePath();
    this.ctx.stroke();
  }

  // Legend rows stack down from the top-left corner, in canvas pixels
  drawLegend(entries: readonly LegendEntry[]): void {
    entries.forEach((entry, i) => {
      const y = LEGEND.MARGIN + i * LEGEND.ROW_HEIGHT + LEGEND.ROW_HEIGHT / 2;
      const markerSize = Math.min(entry.style.size, LEGEND.ROW_HEIGHT - 4);
      this.fillShape(LEGEND.MARGIN + markerSize / 2, y, { ...entry.style, size: markerSize });

      this.ctx.fillStyle = LEGEND.TEXT.color;
      this.ctx.font = `${LEGEND.TEXT.fontSize}px monospace`;
      this.ctx.fillText(entry.label, LEGEND.MARGIN + markerSize + 6, y + LEGEND.TEXT.fontSize / 3);
    });
  }

  private fillShape(x: number, y: number, style: MarkerStyle): void {
    const half = style.size / 2;
    this.ctx.fillStyle = style.color;

    if (style.shape === 'square') {
      this.ctx.fillRect(x - half, y - half, style.size, style.size);
      return;
    }

    this.ctx.beginPath();
    if (style.shape === 'triangle') {
      this.ctx.moveTo(x, y - half);
      this.ctx.lineTo(x + half, y + half);
      this.ctx.lineTo(x - half, y + half);
      this.ctx.closePath();
    } else {
      this.ctx.arc(x, y, half, 0, Math.PI * 2);
    }
    this.ctx.fill();
  }
}
