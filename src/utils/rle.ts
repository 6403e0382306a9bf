/**
 * RLE (Run-Length Encoding) utilities for masks coming off the inference server
 *
 * Supports both:
 * - Simple RLE: counts is number[]
 * - COCO RLE: counts is a compressed string (from pycocotools)
 *
 * RLE runs are column-major (Fortran order); BinaryMask is row-major.
 */
import type { BinaryMask } from '../types';

export interface RLEMask {
  counts: number[] | string;
  size: [number, number];  // [height, width]
}

/**
 * Decode COCO-style compressed RLE string to run lengths
 * This matches pycocotools' LEB128 variant encoding
 */
function decodeCocoCounts(s: string): number[] {
  const cnts: number[] = [];
  let p = 0;

  while (p < s.length) {
    let x = 0;
    let k = 0;
    let more = true;

    while (more) {
      if (p >= s.length) {
        throw new Error('Truncated RLE string');
      }
      const c = s.charCodeAt(p) - 48;  // '0' = 48
      x |= (c & 0x1f) << (5 * k);
      more = (c & 0x20) !== 0;
      p++;
      k++;
      if (!more && (c & 0x10) !== 0) {
        x |= -1 << (5 * k);
      }
    }

    if (cnts.length > 2) {
      x += cnts[cnts.length - 2];
    }
    cnts.push(x);
  }

  return cnts;
}

/**
 * Encode run lengths into the COCO compressed string form
 */
function encodeCocoCounts(counts: number[]): string {
  let s = '';
  for (let i = 0; i < counts.length; i++) {
    let x = counts[i];
    if (i > 2) x -= counts[i - 2];
    let more = true;
    while (more) {
      let c = x & 0x1f;
      x >>= 5;
      more = (c & 0x10) !== 0 ? x !== -1 : x !== 0;
      if (more) c |= 0x20;
      s += String.fromCharCode(c + 48);
    }
  }
  return s;
}

/**
 * Expand column-major run lengths into a row-major mask
 */
function countsToMask(counts: number[], height: number, width: number): BinaryMask {
  const total = height * width;
  const data = new Uint8Array(total);
  let idx = 0;
  let val = 0;

  for (const count of counts) {
    if (count < 0) {
      throw new Error(`Negative RLE run: ${count}`);
    }
    for (let i = 0; i < count && idx < total; i++) {
      if (val) {
        // idx walks column-major: x = idx / height, y = idx % height
        const x = Math.floor(idx / height);
        const y = idx % height;
        data[y * width + x] = 1;
      }
      idx++;
    }
    val = 1 - val;
  }

  return { width, height, data };
}

/**
 * Decode RLE mask to a row-major binary mask
 */
export function decodeRLE(rle: RLEMask): BinaryMask {
  const [height, width] = rle.size;

  let counts: number[];
  if (typeof rle.counts === 'string') {
    counts = decodeCocoCounts(rle.counts);
  } else {
    counts = rle.counts;
  }

  return countsToMask(counts, height, width);
}

/**
 * Encode a row-major binary mask as RLE. Runs always start with a background
 * run (possibly zero), as pycocotools expects.
 */
export function encodeRLE(mask: BinaryMask, compressed = false): RLEMask {
  const { width, height, data } = mask;
  const counts: number[] = [];
  let current = 0;
  let run = 0;

  for (let x = 0; x < width; x++) {
    for (let y = 0; y < height; y++) {
      const value = data[y * width + x] ? 1 : 0;
      if (value !== current) {
        counts.push(run);
        run = 0;
        current = value;
      }
      run++;
    }
  }
  counts.push(run);

  return {
    counts: compressed ? encodeCocoCounts(counts) : counts,
    size: [height, width],
  };
}
