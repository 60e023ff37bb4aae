import * as THREE from 'three';
import { RenderError } from './errors';

/**
 * How downscale() reduces the image: averaging every covered pixel, or picking
 * one of them.
 */
export type Downscaling = 'high-quality' | 'low-quality';

export type RGBA8 = [number, number, number, number];

const OPAQUE_BLACK = 0xff000000;

function toByte(channel: number): number {
  if (!Number.isFinite(channel)) return 0;
  return Math.round(Math.min(Math.max(channel, 0), 1) * 255);
}

/**
 * Packs a color with channels in [0, 1] into an opaque RGBA8 word,
 * red in the lowest byte. Out-of-range channels are clamped, non-finite
 * ones written as 0.
 */
export function packColor(color: THREE.Color): number {
  return (toByte(color.r) | (toByte(color.g) << 8) | (toByte(color.b) << 16) | OPAQUE_BLACK) >>> 0;
}

export function unpackColor(word: number): RGBA8 {
  return [word & 0xff, (word >>> 8) & 0xff, (word >>> 16) & 0xff, word >>> 24];
}

/**
 * CPU side RGBA8 image. Row 0 is the bottom row of the picture.
 */
export class FrameBuffer {
  private pixels: Uint32Array;
  private mapped = false;

  constructor(
    private w: number,
    private h: number,
    public readonly downscaling: Downscaling = 'high-quality'
  ) {
    FrameBuffer.checkSize(w, h);
    this.pixels = new Uint32Array(w * h).fill(OPAQUE_BLACK);
  }

  private static checkSize(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RenderError(`Frame buffer size must be positive integers, got ${width}x${height}`);
    }
  }

  get width(): number {
    return this.w;
  }

  get height(): number {
    return this.h;
  }

  /**
   * Maps the pixel words for writing while `f` runs. A nested fill of the same
   * frame buffer can't map it a second time and returns null.
   */
  fill<T>(f: (width: number, height: number, pixels: Uint32Array) => T): T | null {
    if (this.mapped) {
      console.error('[FrameBuffer] fill: frame buffer is already mapped');
      return null;
    }
    this.mapped = true;
    try {
      return f(this.w, this.h, this.pixels);
    } finally {
      this.mapped = false;
    }
  }

  // New size, contents cleared to opaque black
  resize(width: number, height: number) {
    FrameBuffer.checkSize(width, height);
    if (this.mapped) {
      throw new RenderError('Cannot resize a frame buffer while it is mapped');
    }
    this.w = width;
    this.h = height;
    this.pixels = new Uint32Array(width * height).fill(OPAQUE_BLACK);
  }

  getPixel(x: number, y: number): RGBA8 {
    if (x < 0 || y < 0 || x >= this.w || y >= this.h) {
      throw new RangeError(`Pixel (${x}, ${y}) outside ${this.w}x${this.h} frame buffer`);
    }
    return unpackColor(this.pixels[y * this.w + x]);
  }

  // Copy of the pixel words
  words(): Uint32Array {
    return this.pixels.slice();
  }

  /**
   * Image reduced by an integer factor in both directions (rounding the size
   * down). High quality averages each factor x factor block, low quality takes
   * its lower left pixel.
   */
  downscale(factor: number): FrameBuffer {
    if (!Number.isInteger(factor) || factor < 1) {
      throw new RenderError(`Downscale factor must be a positive integer, got ${factor}`);
    }
    const width = Math.max(1, Math.floor(this.w / factor));
    const height = Math.max(1, Math.floor(this.h / factor));
    const result = new FrameBuffer(width, height, this.downscaling);
    const src = this.pixels;
    const srcWidth = this.w;
    const blockW = Math.min(factor, this.w);
    const blockH = Math.min(factor, this.h);

    result.fill((_w, _h, dst) => {
      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          if (this.downscaling === 'low-quality') {
            dst[y * width + x] = src[y * factor * srcWidth + x * factor];
            continue;
          }
          const sum = [0, 0, 0, 0];
          for (let by = 0; by < blockH; by++) {
            for (let bx = 0; bx < blockW; bx++) {
              const rgba = unpackColor(src[(y * factor + by) * srcWidth + x * factor + bx]);
              for (let c = 0; c < 4; c++) sum[c] += rgba[c];
            }
          }
          const n = blockW * blockH;
          const [r, g, b, a] = sum.map((s) => Math.round(s / n));
          dst[y * width + x] = (r | (g << 8) | (b << 16) | (a << 24)) >>> 0;
        }
      }
    });
    return result;
  }
}
