// lib/raster/canvas.ts
// RGBA pixel canvas with source-over blending onto an opaque background.

import type { RGB, RGBA } from '../../types';

export class RasterCanvas {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;

  constructor(width: number, height: number, background: RGB = [255, 255, 255]) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`[canvas] size must be positive integers, got ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = new Uint8ClampedArray(width * height * 4);
    this.fill(background);
  }

  fill(color: RGB): void {
    const d = this.data;
    for (let i = 0; i < d.length; i += 4) {
      d[i] = color[0];
      d[i + 1] = color[1];
      d[i + 2] = color[2];
      d[i + 3] = 255;
    }
  }

  getPixel(x: number, y: number): RGBA {
    const i = (y * this.width + x) * 4;
    return [this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]];
  }

  blendPixel(x: number, y: number, color: RGBA): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
    const a = color[3] / 255;
    const i = (y * this.width + x) * 4;
    const d = this.data;
    d[i] = Math.round(color[0] * a + d[i] * (1 - a));
    d[i + 1] = Math.round(color[1] * a + d[i + 1] * (1 - a));
    d[i + 2] = Math.round(color[2] * a + d[i + 2] * (1 - a));
    d[i + 3] = 255;
  }

  /** Pixels whose centres fall inside [x0, x1] x [y0, y1]. */
  fillRect(x0: number, y0: number, x1: number, y1: number, color: RGBA): void {
    const [cx0, cx1] = this.span(x0, x1, this.width);
    const [cy0, cy1] = this.span(y0, y1, this.height);
    for (let y = cy0; y <= cy1; y++) {
      for (let x = cx0; x <= cx1; x++) this.blendPixel(x, y, color);
    }
  }

  /** Ellipse inscribed in the bounding box [x0, x1] x [y0, y1]. */
  fillEllipse(x0: number, y0: number, x1: number, y1: number, color: RGBA): void {
    const rx = (x1 - x0) / 2;
    const ry = (y1 - y0) / 2;
    if (!(rx > 0) || !(ry > 0)) return;
    const cx = x0 + rx;
    const cy = y0 + ry;
    const [px0, px1] = this.span(x0, x1, this.width);
    const [py0, py1] = this.span(y0, y1, this.height);
    for (let y = py0; y <= py1; y++) {
      const dy = (y + 0.5 - cy) / ry;
      for (let x = px0; x <= px1; x++) {
        const dx = (x + 0.5 - cx) / rx;
        if (dx * dx + dy * dy <= 1) this.blendPixel(x, y, color);
      }
    }
  }

  /** Segment stroked to `lineWidth`; a width-1 line still covers one pixel row. */
  drawLine(x0: number, y0: number, x1: number, y1: number, color: RGBA, lineWidth = 1): void {
    const half = Math.max(0.5, lineWidth / 2);
    const [px0, px1] = this.span(Math.min(x0, x1) - half, Math.max(x0, x1) + half, this.width);
    const [py0, py1] = this.span(Math.min(y0, y1) - half, Math.max(y0, y1) + half, this.height);
    const vx = x1 - x0;
    const vy = y1 - y0;
    const len2 = vx * vx + vy * vy;
    for (let y = py0; y <= py1; y++) {
      for (let x = px0; x <= px1; x++) {
        const qx = x + 0.5 - x0;
        const qy = y + 0.5 - y0;
        const t = len2 > 0 ? Math.max(0, Math.min(1, (qx * vx + qy * vy) / len2)) : 0;
        const ex = qx - t * vx;
        const ey = qy - t * vy;
        if (ex * ex + ey * ey <= half * half) this.blendPixel(x, y, color);
      }
    }
  }

  // Pixel index range whose centres lie in [a, b], clipped to [0, size).
  private span(a: number, b: number, size: number): [number, number] {
    const lo = Math.max(0, Math.ceil(Math.min(a, b) - 0.5));
    const hi = Math.min(size - 1, Math.floor(Math.max(a, b) - 0.5));
    return [lo, hi];
  }
}
