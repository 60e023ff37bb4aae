import { describe, it, expect, vi, afterEach } from 'vitest';
import * as THREE from 'three';
import { RenderError } from './errors';
import { FrameBuffer, packColor, unpackColor } from './framebuffer';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('packColor', () => {
  it('packs red into the lowest byte with opaque alpha', () => {
    expect(packColor(new THREE.Color(1, 0, 0))).toBe(0xff0000ff);
    expect(packColor(new THREE.Color(0, 0.5, 1))).toBe(0xffff8000);
  });

  it('clamps out of range channels and zeroes non-finite ones', () => {
    expect(packColor(new THREE.Color(2, -1, NaN))).toBe(0xff0000ff);
    expect(packColor(new THREE.Color(Infinity, 0, 0))).toBe(0xff000000);
  });

  it('unpacks back to bytes', () => {
    expect(unpackColor(0xff8040ff)).toEqual([255, 64, 128, 255]);
  });
});

describe('FrameBuffer', () => {
  it('starts opaque black', () => {
    const fb = new FrameBuffer(2, 3);
    expect(fb.width).toBe(2);
    expect(fb.height).toBe(3);
    expect(fb.getPixel(1, 2)).toEqual([0, 0, 0, 255]);
  });

  it('rejects invalid sizes', () => {
    expect(() => new FrameBuffer(0, 2)).toThrow(RenderError);
    expect(() => new FrameBuffer(2, 1.5)).toThrow('Frame buffer size must be positive integers, got 2x1.5');
  });

  it('writes pixels through fill and returns its result', () => {
    const fb = new FrameBuffer(2, 2);
    const result = fb.fill((width, height, pixels) => {
      pixels[1 * width + 0] = 0xff0000ff;
      return width * height;
    });
    expect(result).toBe(4);
    expect(fb.getPixel(0, 1)).toEqual([255, 0, 0, 255]);
  });

  it('fails a nested fill', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const fb = new FrameBuffer(1, 1);
    const inner = fb.fill(() => fb.fill(() => 'inner'));
    expect(inner).toBeNull();
    expect(error).toHaveBeenCalledWith('[FrameBuffer] fill: frame buffer is already mapped');
    // The outer mapping is released afterwards
    expect(fb.fill(() => 'again')).toBe('again');
  });

  it('clears on resize', () => {
    const fb = new FrameBuffer(1, 1);
    fb.fill((_w, _h, pixels) => pixels.fill(0xffffffff));
    fb.resize(3, 2);
    expect(fb.width).toBe(3);
    expect(fb.words()).toEqual(new Uint32Array(6).fill(0xff000000));
  });

  it('cannot resize while mapped', () => {
    const fb = new FrameBuffer(1, 1);
    expect(() => fb.fill(() => fb.resize(2, 2))).toThrow('Cannot resize a frame buffer while it is mapped');
  });

  it('bounds checks pixel reads', () => {
    const fb = new FrameBuffer(2, 2);
    expect(() => fb.getPixel(2, 0)).toThrow(RangeError);
    expect(() => fb.getPixel(0, -1)).toThrow('Pixel (0, -1) outside 2x2 frame buffer');
  });

  it('returns a copy of the pixel words', () => {
    const fb = new FrameBuffer(1, 1);
    fb.words()[0] = 0;
    expect(fb.getPixel(0, 0)).toEqual([0, 0, 0, 255]);
  });
});

describe('downscale', () => {
  function checker(downscaling: 'high-quality' | 'low-quality'): FrameBuffer {
    const fb = new FrameBuffer(2, 2, downscaling);
    fb.fill((_w, _h, pixels) => {
      pixels.set([0xff000000, 0xff000064, 0xff0000c8, 0xff0000ff]);
    });
    return fb;
  }

  it('averages blocks in high quality', () => {
    const small = checker('high-quality').downscale(2);
    expect(small.width).toBe(1);
    expect(small.height).toBe(1);
    // (0 + 100 + 200 + 255) / 4 = 138.75
    expect(small.getPixel(0, 0)).toEqual([139, 0, 0, 255]);
  });

  it('takes the lower left pixel in low quality', () => {
    expect(checker('low-quality').downscale(2).getPixel(0, 0)).toEqual([0, 0, 0, 255]);
  });

  it('copies with a factor of one', () => {
    expect(checker('high-quality').downscale(1).words()).toEqual(checker('high-quality').words());
  });

  it('rejects non-integer factors', () => {
    expect(() => checker('high-quality').downscale(1.5)).toThrow(
      'Downscale factor must be a positive integer, got 1.5'
    );
  });
});
