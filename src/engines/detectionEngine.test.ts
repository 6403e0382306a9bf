import { describe, it, expect, beforeEach } from 'vitest';
import { DetectionEngine, parseClassPrompt } from './detectionEngine';
import { InferenceError, InvalidPromptError, LoadError, ModelNotLoadedError } from '../utils/errors';
import { setLogLevel } from '../utils/logger';
import { createFakeModelServer, loaded, solidImage, type RouteHandler } from '../test-utils/fakeModelServer';

setLogLevel('silent');

function setup(routes: Record<string, RouteHandler> = {}) {
  const server = createFakeModelServer({ 'POST /models/load': loaded('det-1'), ...routes });
  const engine = new DetectionEngine(server.client);
  const progress: [number, string][] = [];
  const errors: string[] = [];
  engine.onProgress((p, m) => progress.push([p, m]));
  engine.onError((m) => errors.push(m));
  return { server, engine, progress, errors };
}

describe('parseClassPrompt', () => {
  it('splits on commas and drops blanks', () => {
    expect(parseClassPrompt(' cat ,dog, ,person')).toEqual(['cat', 'dog', 'person']);
  });
});

describe('DetectionEngine lifecycle', () => {
  it('refuses to detect before load', async () => {
    const { engine, errors, server } = setup();
    await expect(engine.detect(solidImage(4, 4), 'cat')).rejects.toBeInstanceOf(ModelNotLoadedError);
    expect(errors).toEqual(['Detector model not loaded. Call load() first.']);
    expect(server.calls).toHaveLength(0);
  });

  it('loads and reports the handle', async () => {
    const { engine, progress, server } = setup();
    const handle = await engine.load('microsoft/Florence-2-large');

    expect(handle).toEqual({ device: 'cpu', loadedState: 'loaded', modelRef: 'det-1' });
    expect(engine.isLoaded()).toBe(true);
    expect(progress[0]).toEqual([10, 'Loading Detector model...']);
    expect(progress[progress.length - 1]).toEqual([100, 'Detector model loaded']);
    expect(server.bodiesFor('POST /models/load')).toEqual([
      { family: 'detector', model_path: 'microsoft/Florence-2-large', device: 'cpu' },
    ]);
  });

  it('warns and carries on when the requested device is unavailable', async () => {
    const { engine, progress } = setup();
    await engine.load('florence', 'cuda');

    expect(progress).toContainEqual([50, 'Warning: cuda unavailable, falling back to cpu']);
    expect(engine.getDevice()).toBe('cpu');
    expect(engine.isLoaded()).toBe(true);
  });

  it('clears the handle when loading fails', async () => {
    const { engine, errors } = setup({
      'POST /models/load': () => ({ status: 500, data: { detail: 'checkpoint not found' } }),
    });

    const err = await engine.load('missing').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LoadError);
    expect(err).toHaveProperty('message', 'Failed to load Detector model: checkpoint not found');
    expect(errors).toEqual(['Failed to load Detector model: checkpoint not found']);
    expect(engine.getHandle()).toEqual({ device: 'cpu', loadedState: 'failed', modelRef: null });
    expect(engine.isLoaded()).toBe(false);
  });

  it('rejects an empty model path without calling the server', async () => {
    const { engine, server } = setup();
    await expect(engine.load('  ')).rejects.toBeInstanceOf(LoadError);
    expect(server.calls).toHaveLength(0);
  });

  it('unloads', async () => {
    const { engine, server } = setup({ 'POST /models/unload': () => ({ data: { unloaded: true } }) });
    await engine.load('florence');
    await engine.unload();

    expect(engine.isLoaded()).toBe(false);
    expect(engine.getHandle().loadedState).toBe('unloaded');
    expect(server.bodiesFor('POST /models/unload')).toEqual([{ family: 'detector' }]);
  });
});

describe('DetectionEngine.detect', () => {
  let ctx: ReturnType<typeof setup>;
  let reply: RouteHandler;

  beforeEach(async () => {
    reply = () => ({ data: { boxes: [], labels: [], scores: [] } });
    ctx = setup({ 'POST /detect': (body) => reply(body) });
    await ctx.engine.load('florence');
    ctx.progress.length = 0;
  });

  it('filters by threshold and clamps boxes to the image', async () => {
    reply = () => ({
      data: {
        boxes: [
          [-5, 10, 50, 60],
          [10, 10, 20, 20],
          [30, 30, 30, 40],
          [0, 0, 200, 90],
        ],
        labels: ['cat', 'dog', 'cat', 'dog'],
        scores: [0.9, 0.2, 0.8, 0.5],
      },
    });

    const result = await ctx.engine.detect(solidImage(100, 80), ' cat ,dog, ', 0.3);

    expect(result).toEqual({
      boxes: [
        [0, 10, 50, 60],
        [0, 0, 100, 80],
      ],
      labels: ['cat', 'dog'],
      scores: [0.9, 0.5],
    });
    const [body] = ctx.server.bodiesFor('POST /detect');
    expect(body).toMatchObject({ text_prompt: 'cat, dog', confidence_threshold: 0.3 });
    expect(body).toHaveProperty('image.width', 100);
    expect(body).toHaveProperty('image.height', 80);
    expect(ctx.progress.map(([p]) => p)).toEqual([20, 60, 90, 100]);
  });

  it('uses 0.3 as the default threshold', async () => {
    reply = () => ({ data: { boxes: [[1, 1, 2, 2], [1, 1, 3, 3]], labels: ['a', 'a'], scores: [0.29, 0.3] } });
    const result = await ctx.engine.detect(solidImage(10, 10), 'a');
    expect(result.scores).toEqual([0.3]);
  });

  it('rejects a threshold outside [0, 1] before calling the server', async () => {
    await expect(ctx.engine.detect(solidImage(10, 10), 'cat', 1.5)).rejects.toBeInstanceOf(InvalidPromptError);
    expect(ctx.server.bodiesFor('POST /detect')).toHaveLength(0);
  });

  it('rejects a prompt with no classes', async () => {
    await expect(ctx.engine.detect(solidImage(10, 10), ' , ')).rejects.toThrow(
      'Text prompt must name at least one class'
    );
  });

  it('rejects an image that is not 3-channel', async () => {
    const image = { width: 2, height: 2, channels: 4, data: new Uint8Array(16) };
    await expect(ctx.engine.detect(image, 'cat')).rejects.toThrow(
      'Invalid image shape: (2, 2, 4). Expected (H, W, 3)'
    );
  });

  it('fails on misaligned server arrays', async () => {
    reply = () => ({ data: { boxes: [[1, 1, 2, 2], [1, 1, 3, 3]], labels: ['a'], scores: [0.9, 0.9] } });

    const err = await ctx.engine.detect(solidImage(10, 10), 'a').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InferenceError);
    expect(err).toHaveProperty('code', 'INFERENCE_FAILED');
    expect(err).toHaveProperty('message', 'Detection failed: detector returned 2 boxes, 1 labels, 2 scores');
    expect(ctx.errors).toEqual(['Detection failed: detector returned 2 boxes, 1 labels, 2 scores']);
  });

  it('treats a malformed response as invalid', async () => {
    reply = () => ({ data: { boxes: 'nope' } });
    const err = await ctx.engine.detect(solidImage(10, 10), 'a').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InferenceError);
    expect(err).toHaveProperty('code', 'INVALID_RESPONSE');
  });

  it('maps timeouts to TIMEOUT', async () => {
    reply = () => ({ timeout: true });
    const err = await ctx.engine.detect(solidImage(10, 10), 'a').catch((e: unknown) => e);
    expect(err).toHaveProperty('code', 'TIMEOUT');
  });

  it('reports the server detail on HTTP errors', async () => {
    reply = () => ({ status: 500, data: { detail: 'CUDA out of memory' } });
    await expect(ctx.engine.detect(solidImage(10, 10), 'a')).rejects.toThrow('Detection failed: CUDA out of memory');
  });
});

describe('DetectionEngine.predictBatch', () => {
  it('runs the task on every image in order', async () => {
    const { engine, progress, server } = setup({
      'POST /grounded': () => ({ data: { boxes: [[1, 1, 3, 3]], scores: [0.9] } }),
    });
    await engine.load('florence');
    progress.length = 0;

    const results = await engine.predictBatch([solidImage(4, 4), solidImage(6, 6)], 'red car', 'grounded');

    expect(results).toEqual([
      { phrase: 'red car', boxes: [[1, 1, 3, 3]], scores: [0.9] },
      { phrase: 'red car', boxes: [[1, 1, 3, 3]], scores: [0.9] },
    ]);
    expect(server.bodiesFor('POST /grounded')).toHaveLength(2);
    expect(progress).toContainEqual([0, 'Processing image 1/2...']);
    expect(progress).toContainEqual([50, 'Processing image 2/2...']);
  });

  it('defaults to detection', async () => {
    const { engine, server } = setup({
      'POST /detect': () => ({ data: { boxes: [], labels: [], scores: [] } }),
    });
    await engine.load('florence');

    expect(await engine.predictBatch([solidImage(4, 4)], 'cat')).toEqual([{ boxes: [], labels: [], scores: [] }]);
    expect(server.bodiesFor('POST /detect')).toHaveLength(1);
  });

  it('has no caption batch', async () => {
    const { engine, errors, server } = setup();
    await engine.load('florence');

    const err = await engine.predictBatch([solidImage(4, 4)], 'cat', 'caption').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvalidPromptError);
    expect(err).toHaveProperty('message', 'Unsupported batch task: caption');
    expect(errors).toEqual(['Batch prediction failed: Unsupported batch task: caption']);
    expect(server.bodiesFor('POST /caption')).toHaveLength(0);
  });
});

describe('DetectionEngine.refreshStatus', () => {
  it('drops the handle when the server no longer has the model', async () => {
    const { engine, server } = setup({
      'GET /models/detector/status': () => ({ data: { loaded: false, device: null } }),
    });
    await engine.load('florence');

    const handle = await engine.refreshStatus();

    expect(handle).toEqual({ device: 'cpu', loadedState: 'unloaded', modelRef: null });
    expect(engine.isLoaded()).toBe(false);
    expect(server.calls.map((c) => `${c.method} ${c.url}`)).toContain('GET /models/detector/status');
  });

  it('follows a device change', async () => {
    const { engine } = setup({
      'GET /models/detector/status': () => ({ data: { loaded: true, device: 'cuda' } }),
    });
    await engine.load('florence');

    expect(await engine.refreshStatus()).toEqual({ device: 'cuda', loadedState: 'loaded', modelRef: 'det-1' });
  });

  it('leaves an unloaded engine alone', async () => {
    const { engine } = setup({
      'GET /models/detector/status': () => ({ data: { loaded: true, device: 'cpu' } }),
    });
    expect((await engine.refreshStatus()).loadedState).toBe('unloaded');
  });

  it('reports an unreachable server', async () => {
    const { engine } = setup({ 'GET /models/detector/status': () => ({ timeout: true }) });
    const err = await engine.refreshStatus().catch((e: unknown) => e);
    expect(err).toHaveProperty('code', 'TIMEOUT');
  });
});

describe('DetectionEngine other tasks', () => {
  it('dispatches caption and grounded requests through predict', async () => {
    const { engine, server } = setup({
      'POST /caption': () => ({ data: { caption: 'a cat on a sofa' } }),
      'POST /grounded': () => ({ data: { boxes: [[2, 2, 8, 8], [0, 0, 1, 1]], scores: [0.7, 0.1] } }),
    });
    await engine.load('florence');

    expect(await engine.predict(solidImage(10, 10), { task: 'caption', detailed: true })).toEqual({
      caption: 'a cat on a sofa',
    });
    expect(server.bodiesFor('POST /caption')[0]).toHaveProperty('detailed', true);

    expect(await engine.predict(solidImage(10, 10), { task: 'grounded', phrase: ' red car ' })).toEqual({
      phrase: 'red car',
      boxes: [[2, 2, 8, 8]],
      scores: [0.7],
    });
  });

  it('notifies prediction listeners', async () => {
    const { engine } = setup({ 'POST /caption': () => ({ data: { caption: 'x' } }) });
    const seen: unknown[] = [];
    engine.onPredictionComplete((r) => seen.push(r));
    await engine.load('florence');
    await engine.generateCaption(solidImage(2, 2));
    expect(seen).toEqual([{ caption: 'x' }]);
  });

  it('rasterises boxes into rectangle masks', () => {
    const engine = new DetectionEngine(createFakeModelServer({}).client);
    const [mask] = engine.bboxToMask([[1, 0, 3, 2]], 3, 4);
    expect(Array.from(mask.data)).toEqual([0, 1, 1, 0, 0, 1, 1, 0, 0, 0, 0, 0]);
  });
});
