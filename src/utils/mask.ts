/**
 * Binary mask post-processing: morphological smoothing and polygon extraction.
 *
 * Morphology follows OpenCV conventions (elliptical structuring element,
 * pixels outside the image never erode and never dilate). Polygon extraction
 * traces outer boundaries only, compresses straight runs and simplifies with
 * Douglas-Peucker.
 */
import type { BinaryMask, Box, Polygon } from '../types';

type Offset = [number, number];

// ==========================================
// MORPHOLOGY
// ==========================================

/**
 * Offsets of an elliptical kernel of the given size, relative to its center.
 */
export function ellipseKernel(size: number): Offset[] {
  const r = Math.floor(size / 2);
  const c = Math.floor(size / 2);
  const offsets: Offset[] = [];

  for (let i = 0; i < size; i++) {
    const dy = i - r;
    if (Math.abs(dy) > r) continue;
    const dx = r === 0 ? c : Math.round(c * Math.sqrt((r * r - dy * dy) / (r * r)));
    const j1 = Math.max(c - dx, 0);
    const j2 = Math.min(c + dx + 1, size);
    for (let j = j1; j < j2; j++) {
      offsets.push([j - c, dy]);
    }
  }
  return offsets;
}

function morph(mask: BinaryMask, kernel: Offset[], mode: 'erode' | 'dilate'): BinaryMask {
  const { width, height, data } = mask;
  const out = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let value = mode === 'erode' ? 1 : 0;
      for (const [dx, dy] of kernel) {
        const nx = x + dx;
        const ny = y + dy;
        if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
        const v = data[ny * width + nx];
        if (mode === 'erode' && !v) {
          value = 0;
          break;
        }
        if (mode === 'dilate' && v) {
          value = 1;
          break;
        }
      }
      out[y * width + x] = value;
    }
  }
  return { width, height, data: out };
}

function repeat(mask: BinaryMask, kernel: Offset[], mode: 'erode' | 'dilate', iterations: number) {
  let result = mask;
  for (let i = 0; i < iterations; i++) {
    result = morph(result, kernel, mode);
  }
  return result;
}

/**
 * Close (fill small holes) then open (drop specks, round boundaries).
 */
export function smoothMask(mask: BinaryMask, kernelSize = 5, iterations = 2): BinaryMask {
  if (kernelSize < 1 || !Number.isInteger(kernelSize)) {
    throw new RangeError(`kernelSize must be a positive integer, got ${kernelSize}`);
  }
  if (iterations < 0 || !Number.isInteger(iterations)) {
    throw new RangeError(`iterations must be a non-negative integer, got ${iterations}`);
  }
  const kernel = ellipseKernel(kernelSize);

  const closed = repeat(repeat(mask, kernel, 'dilate', iterations), kernel, 'erode', iterations);
  return repeat(repeat(closed, kernel, 'erode', iterations), kernel, 'dilate', iterations);
}

// ==========================================
// CONTOURS
// ==========================================

// Clockwise in image coordinates (y grows downwards), starting east
const DIRS: Offset[] = [[1, 0], [1, 1], [0, 1], [-1, 1], [-1, 0], [-1, -1], [0, -1], [1, -1]];

function dirIndex(dx: number, dy: number): number {
  return DIRS.findIndex(([ddx, ddy]) => ddx === dx && ddy === dy);
}

/**
 * Label 8-connected foreground components in raster order.
 * Returns labels (0 = background) and the raster-first pixel of each component.
 */
function labelComponents(mask: BinaryMask) {
  const { width, height, data } = mask;
  const labels = new Int32Array(width * height);
  const starts: number[] = [];
  const queue: number[] = [];

  for (let i = 0; i < data.length; i++) {
    if (!data[i] || labels[i]) continue;
    const label = starts.length + 1;
    starts.push(i);
    labels[i] = label;
    queue.length = 0;
    queue.push(i);
    for (let q = 0; q < queue.length; q++) {
      const idx = queue[q];
      const x = idx % width;
      const y = Math.floor(idx / width);
      for (const [dx, dy] of DIRS) {
        const nx = x + dx;
        const ny = y + dy;
        if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
        const n = ny * width + nx;
        if (data[n] && !labels[n]) {
          labels[n] = label;
          queue.push(n);
        }
      }
    }
  }
  return { labels, starts };
}

/**
 * Labels of components that touch the outside background, i.e. are not
 * nested inside a hole of another component.
 */
function externalLabels(mask: BinaryMask, labels: Int32Array): Set<number> {
  const { width, height, data } = mask;
  const outside = new Uint8Array(width * height);
  const queue: number[] = [];
  const external = new Set<number>();

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (x !== 0 && y !== 0 && x !== width - 1 && y !== height - 1) continue;
      const idx = y * width + x;
      if (data[idx]) {
        external.add(labels[idx]);
      } else if (!outside[idx]) {
        outside[idx] = 1;
        queue.push(idx);
      }
    }
  }

  const four: Offset[] = [[1, 0], [0, 1], [-1, 0], [0, -1]];
  for (let q = 0; q < queue.length; q++) {
    const idx = queue[q];
    const x = idx % width;
    const y = Math.floor(idx / width);
    for (const [dx, dy] of four) {
      const nx = x + dx;
      const ny = y + dy;
      if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
      const n = ny * width + nx;
      if (data[n]) {
        external.add(labels[n]);
      } else if (!outside[n]) {
        outside[n] = 1;
        queue.push(n);
      }
    }
  }
  return external;
}

/**
 * Moore-neighbour boundary trace of one component, clockwise from its
 * raster-first pixel, stopping on Jacob's criterion.
 */
function traceBoundary(labels: Int32Array, width: number, height: number, start: number): Polygon {
  const label = labels[start];
  const inside = (x: number, y: number) =>
    x >= 0 && y >= 0 && x < width && y < height && labels[y * width + x] === label;

  const sx = start % width;
  const sy = Math.floor(start / width);
  const contour: Polygon = [[sx, sy]];
  let cx = sx;
  let cy = sy;
  let backDir = 4;  // west of the raster-first pixel is background
  let firstDir = -1;

  for (;;) {
    let found = -1;
    for (let k = 1; k <= 8; k++) {
      const d = (backDir + k) % 8;
      if (inside(cx + DIRS[d][0], cy + DIRS[d][1])) {
        found = d;
        break;
      }
    }
    if (found < 0) break;  // isolated pixel
    if (cx === sx && cy === sy && found === firstDir) break;
    if (firstDir < 0) firstDir = found;

    const nx = cx + DIRS[found][0];
    const ny = cy + DIRS[found][1];
    const prev = DIRS[(found + 7) % 8];
    backDir = dirIndex(cx + prev[0] - nx, cy + prev[1] - ny);
    cx = nx;
    cy = ny;
    contour.push([cx, cy]);
  }

  if (contour.length > 1) {
    const [lx, ly] = contour[contour.length - 1];
    if (lx === sx && ly === sy) contour.pop();
  }
  return contour;
}

/**
 * Keep only the points where the chain changes direction.
 */
function compressChain(contour: Polygon): Polygon {
  if (contour.length < 3) return contour;
  const n = contour.length;
  const kept: Polygon = [];
  for (let i = 0; i < n; i++) {
    const [px, py] = contour[(i - 1 + n) % n];
    const [x, y] = contour[i];
    const [nx, ny] = contour[(i + 1) % n];
    const inDir = [Math.sign(x - px), Math.sign(y - py)];
    const outDir = [Math.sign(nx - x), Math.sign(ny - y)];
    if (inDir[0] !== outDir[0] || inDir[1] !== outDir[1]) kept.push(contour[i]);
  }
  return kept;
}

function closedLength(points: Polygon): number {
  let length = 0;
  for (let i = 0; i < points.length; i++) {
    const [x1, y1] = points[i];
    const [x2, y2] = points[(i + 1) % points.length];
    length += Math.hypot(x2 - x1, y2 - y1);
  }
  return length;
}

function pointLineDistance(p: [number, number], a: [number, number], b: [number, number]) {
  const dx = b[0] - a[0];
  const dy = b[1] - a[1];
  const len = Math.hypot(dx, dy);
  if (len === 0) return Math.hypot(p[0] - a[0], p[1] - a[1]);
  return Math.abs(dy * p[0] - dx * p[1] + b[0] * a[1] - b[1] * a[0]) / len;
}

function douglasPeucker(points: Polygon, epsilon: number): Polygon {
  if (points.length < 3) return points;
  const first = points[0];
  const last = points[points.length - 1];
  let maxDist = -1;
  let index = 0;
  for (let i = 1; i < points.length - 1; i++) {
    const dist = pointLineDistance(points[i], first, last);
    if (dist > maxDist) {
      maxDist = dist;
      index = i;
    }
  }
  if (maxDist <= epsilon) return [first, last];
  const left = douglasPeucker(points.slice(0, index + 1), epsilon);
  const right = douglasPeucker(points.slice(index), epsilon);
  return [...left.slice(0, -1), ...right];
}

/**
 * Simplify a closed contour: split at the point farthest from the first
 * point and simplify both halves.
 */
export function simplifyClosed(points: Polygon, epsilon: number): Polygon {
  if (points.length < 3) return points;
  const [ox, oy] = points[0];
  let far = 0;
  let farDist = -1;
  for (let i = 1; i < points.length; i++) {
    const dist = Math.hypot(points[i][0] - ox, points[i][1] - oy);
    if (dist > farDist) {
      farDist = dist;
      far = i;
    }
  }
  const firstHalf = douglasPeucker(points.slice(0, far + 1), epsilon);
  const secondHalf = douglasPeucker([...points.slice(far), points[0]], epsilon);
  return [...firstHalf.slice(0, -1), ...secondHalf.slice(0, -1)];
}

/**
 * Outer contours of the mask as simplified polygons, in raster order of
 * their top-left pixel. Fragments that simplify to fewer than 3 points are dropped.
 */
export function maskToPolygon(mask: BinaryMask, epsilonFactor = 0.001): Polygon[] {
  if (epsilonFactor < 0) {
    throw new RangeError(`epsilonFactor must be >= 0, got ${epsilonFactor}`);
  }
  const { labels, starts } = labelComponents(mask);
  const external = externalLabels(mask, labels);
  const polygons: Polygon[] = [];

  for (const start of starts) {
    if (!external.has(labels[start])) continue;
    const contour = compressChain(traceBoundary(labels, mask.width, mask.height, start));
    const epsilon = epsilonFactor * closedLength(contour);
    const polygon = simplifyClosed(contour, epsilon);
    if (polygon.length >= 3) polygons.push(polygon);
  }
  return polygons;
}

// ==========================================
// HELPERS
// ==========================================

export function emptyMask(height: number, width: number): BinaryMask {
  return { width, height, data: new Uint8Array(width * height) };
}

export function maskArea(mask: BinaryMask): number {
  let area = 0;
  for (const v of mask.data) area += v ? 1 : 0;
  return area;
}

/**
 * Filled rectangle per box, clipped to the image. Box edges are inclusive of
 * x1/y1 and exclusive of x2/y2.
 */
export function bboxToMask(boxes: Box[], height: number, width: number): BinaryMask[] {
  return boxes.map(([x1, y1, x2, y2]) => {
    const mask = emptyMask(height, width);
    const left = Math.max(0, Math.floor(x1));
    const top = Math.max(0, Math.floor(y1));
    const right = Math.min(width, Math.ceil(x2));
    const bottom = Math.min(height, Math.ceil(y2));
    for (let y = top; y < bottom; y++) {
      mask.data.fill(1, y * width + left, y * width + right);
    }
    return mask;
  });
}
