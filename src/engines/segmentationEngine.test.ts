import { describe, it, expect, beforeEach } from 'vitest';
import { SegmentationEngine, argmax } from './segmentationEngine';
import { InferenceError, InvalidImageError, InvalidPromptError, ModelNotLoadedError } from '../utils/errors';
import { imageKey } from '../utils/image';
import { bboxToMask, emptyMask } from '../utils/mask';
import { encodeRLE } from '../utils/rle';
import { setLogLevel } from '../utils/logger';
import { createFakeModelServer, loaded, solidImage, type RouteHandler } from '../test-utils/fakeModelServer';

setLogLevel('silent');

// 4x3 image; two candidate masks of different sizes
const [SMALL, LARGE] = bboxToMask(
  [
    [0, 0, 1, 1],
    [0, 0, 3, 2],
  ],
  3,
  4
);

describe('argmax', () => {
  it('keeps the first of equal maxima', () => {
    expect(argmax([0.2, 0.9, 0.9, 0.1])).toBe(1);
  });
});

describe('SegmentationEngine before load', () => {
  it('refuses to predict', async () => {
    const server = createFakeModelServer({});
    const engine = new SegmentationEngine(server.client);
    const errors: string[] = [];
    engine.onError((m) => errors.push(m));

    await expect(engine.predict(solidImage(4, 3), { box: [0, 0, 1, 1] })).rejects.toBeInstanceOf(ModelNotLoadedError);
    expect(errors).toEqual(['Segmenter model not loaded. Call load() first.']);
    expect(server.calls).toHaveLength(0);
  });
});

describe('SegmentationEngine', () => {
  let reply: RouteHandler;
  let server: ReturnType<typeof createFakeModelServer>;
  let engine: SegmentationEngine;
  let progress: [number, string][];

  beforeEach(async () => {
    reply = () => ({ data: { masks: [encodeRLE(SMALL), encodeRLE(LARGE)], scores: [0.4, 0.9] } });
    server = createFakeModelServer({
      'POST /models/load': loaded('sam-1'),
      'POST /segment': (body) => reply(body),
    });
    engine = new SegmentationEngine(server.client);
    await engine.load('checkpoints/sam2.1_hiera_large.pt');
    progress = [];
    engine.onProgress((p, m) => progress.push([p, m]));
  });

  it('returns only the best candidate by default', async () => {
    const image = solidImage(4, 3);
    const result = await engine.predict(image, { box: [0, 0, 3, 2] });

    expect(result.scores).toEqual([0.9]);
    expect(result.masks).toHaveLength(1);
    expect(Array.from(result.masks[0].data)).toEqual(Array.from(LARGE.data));

    expect(server.bodiesFor('POST /segment')[0]).toMatchObject({
      image_key: imageKey(image),
      points: null,
      box: [0, 0, 3, 2],
      multimask_output: true,
    });
    expect(progress).toEqual([
      [20, 'Preprocessing image...'],
      [40, 'Generating embeddings...'],
      [60, 'Running segmentation...'],
      [90, 'Post-processing...'],
      [100, 'Segmentation complete'],
    ]);
  });

  it('returns every candidate with multimaskOutput', async () => {
    const result = await engine.predict(solidImage(4, 3), {
      points: [{ x: 1, y: 1, label: 1 }],
      multimaskOutput: true,
    });

    expect(result.scores).toEqual([0.4, 0.9]);
    expect(result.masks.map((m) => Array.from(m.data))).toEqual([Array.from(SMALL.data), Array.from(LARGE.data)]);
    expect(server.bodiesFor('POST /segment')[0]).toMatchObject({ points: [[1, 1, 1]], box: null });
  });

  it('needs at least one prompt', async () => {
    const err = await engine.predict(solidImage(4, 3), {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvalidPromptError);
    expect(err).toHaveProperty('message', 'Segmentation needs point prompts, a box prompt, or both');
    expect(server.bodiesFor('POST /segment')).toHaveLength(0);
  });

  it('rejects an inverted box', async () => {
    await expect(engine.predict(solidImage(4, 3), { box: [3, 0, 1, 2] })).rejects.toBeInstanceOf(InvalidPromptError);
  });

  it('rejects masks that do not match the image', async () => {
    reply = () => ({ data: { masks: [encodeRLE(emptyMask(2, 2))], scores: [0.5] } });
    await expect(engine.predict(solidImage(4, 3), { box: [0, 0, 1, 1] })).rejects.toBeInstanceOf(InvalidImageError);
  });

  it('rejects a response without candidates', async () => {
    reply = () => ({ data: { masks: [], scores: [] } });
    const err = await engine.predict(solidImage(4, 3), { box: [0, 0, 1, 1] }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InferenceError);
    expect(err).toHaveProperty('code', 'INVALID_RESPONSE');
  });

  it('reuses the image key for repeated prompts on one image', async () => {
    const image = solidImage(4, 3);
    await engine.predict(image, { box: [0, 0, 1, 1] });
    await engine.predict(image, { box: [0, 0, 2, 2] });
    const keys = server.bodiesFor('POST /segment').map((b) => (b && typeof b === 'object' && 'image_key' in b ? b.image_key : null));
    expect(keys).toEqual([imageKey(image), imageKey(image)]);
  });

  it('rehashes a buffer that was rewritten in place', async () => {
    const image = solidImage(4, 3, 10);
    await engine.predict(image, { box: [0, 0, 1, 1] });
    const before = imageKey(image);
    image.data.fill(200);
    await engine.predict(image, { box: [0, 0, 1, 1] });

    expect(server.bodiesFor('POST /segment').map((b) => (b && typeof b === 'object' && 'image_key' in b ? b.image_key : null))).toEqual([
      before,
      imageKey(image),
    ]);
    expect(imageKey(image)).not.toBe(before);
  });

  it('runs one prediction per image in a batch', async () => {
    const results = await engine.predictBatch([solidImage(4, 3, 0), solidImage(4, 3, 255)], { box: [0, 0, 3, 2] });
    expect(results).toHaveLength(2);
    expect(progress).toContainEqual([0, 'Processing image 1/2...']);
    expect(progress).toContainEqual([50, 'Processing image 2/2...']);
  });

  it('refines with positive and negative points', async () => {
    await engine.refineMask(solidImage(4, 3), LARGE, [[1, 1]], [[3, 2]]);
    expect(server.bodiesFor('POST /segment')[0]).toMatchObject({
      points: [
        [1, 1, 1],
        [3, 2, 0],
      ],
      box: null,
    });
  });

  it('refuses to refine a mask of another size', async () => {
    await expect(engine.refineMask(solidImage(4, 3), emptyMask(3, 3), [[1, 1]])).rejects.toThrow(
      'Mask size 3x3 does not match image 4x3'
    );
  });

  it('smooths and polygonises through the engine', () => {
    const [rect] = bboxToMask([[1, 1, 5, 4]], 5, 6);
    expect(engine.maskToPolygon(rect)).toEqual([
      [
        [1, 1],
        [4, 1],
        [4, 3],
        [1, 3],
      ],
    ]);
    expect(engine.smoothMask(emptyMask(4, 4)).data.every((v) => v === 0)).toBe(true);
  });
});
