import { writeFileSync } from 'fs';
import { deflateSync } from 'zlib';
import { FrameBuffer, unpackColor } from './framebuffer';

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const CRC_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (let i = 0; i < data.length; i++) {
    crc = CRC_TABLE[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function chunk(type: string, data: Buffer): Buffer {
  // length (4) + type (4) + data + crc (4)
  const out = Buffer.alloc(12 + data.length);
  out.writeUInt32BE(data.length, 0);
  out.write(type, 4, 'ascii');
  data.copy(out, 8);
  out.writeUInt32BE(crc32(out.subarray(4, 8 + data.length)), 8 + data.length);
  return out;
}

/**
 * Encodes the frame buffer as an 8-bit RGBA PNG. The frame buffer stores its
 * bottom row first, PNG the top row, so rows are flipped. Alpha is written as
 * fully opaque whatever the frame buffer holds.
 */
export function exportToPNG(framebuffer: FrameBuffer): Buffer {
  const { width, height } = framebuffer;
  const words = framebuffer.words();

  const stride = 1 + width * 4; // filter type byte + RGBA
  const raw = Buffer.alloc(stride * height);
  for (let row = 0; row < height; row++) {
    const srcRow = height - 1 - row;
    let offset = row * stride;
    raw[offset++] = 0; // filter: none
    for (let x = 0; x < width; x++) {
      const [r, g, b] = unpackColor(words[srcRow * width + x]);
      raw[offset++] = r;
      raw[offset++] = g;
      raw[offset++] = b;
      raw[offset++] = 0xff;
    }
  }

  const header = Buffer.alloc(13);
  header.writeUInt32BE(width, 0);
  header.writeUInt32BE(height, 4);
  header[8] = 8; // bit depth
  header[9] = 6; // color type: RGBA
  header[10] = 0; // compression
  header[11] = 0; // filter method
  header[12] = 0; // no interlace

  return Buffer.concat([
    PNG_SIGNATURE,
    chunk('IHDR', header),
    chunk('IDAT', deflateSync(raw)),
    chunk('IEND', Buffer.alloc(0)),
  ]);
}

export function savePNG(framebuffer: FrameBuffer, filename: string): void {
  writeFileSync(filename, exportToPNG(framebuffer));
  console.log(`[FrameBuffer] Saved screenshot of frame buffer to ${filename}`);
}
