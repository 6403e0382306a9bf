import { describe, it, expect } from 'vitest';
import { InferenceError } from '../utils/errors';
import { createFakeModelServer } from '../test-utils/fakeModelServer';

describe('createModelServerClient', () => {
  it('sends images as base64 raw pixels', async () => {
    const server = createFakeModelServer({ 'POST /caption': () => ({ data: { caption: 'dots' } }) });
    const image = { width: 1, height: 1, channels: 3, data: new Uint8Array([1, 2, 3]) };

    expect(await server.client.caption(image, false)).toBe('dots');
    expect(server.bodiesFor('POST /caption')).toEqual([
      { image: { data: 'AQID', width: 1, height: 1, channels: 3 }, detailed: false },
    ]);
  });

  it('reads model status', async () => {
    const server = createFakeModelServer({
      'GET /models/segmenter/status': () => ({ data: { loaded: true, device: 'mps' } }),
    });
    expect(await server.client.getStatus('segmenter')).toEqual({ loaded: true, device: 'mps' });
  });

  it('rejects an unknown device in a load response', async () => {
    const server = createFakeModelServer({
      'POST /models/load': () => ({ data: { model_id: 'x', device: 'tpu', loaded: true } }),
    });
    const err = await server.client.loadModel('detector', 'florence', 'cpu').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InferenceError);
    expect(err).toHaveProperty('code', 'INVALID_RESPONSE');
    expect(err).toHaveProperty('details', { endpoint: '/models/load' });
  });

  it('accepts compressed RLE masks', async () => {
    const server = createFakeModelServer({
      'POST /segment': () => ({ data: { masks: [{ counts: '2111', size: [2, 3] }], scores: [0.7] } }),
    });
    const image = { width: 3, height: 2, channels: 3, data: new Uint8Array(18) };

    const response = await server.client.segment(image, 'key', undefined, [0, 0, 2, 2]);

    expect(response.masks[0].counts).toBe('2111');
    expect(server.bodiesFor('POST /segment')[0]).toMatchObject({ image_key: 'key', points: null, box: [0, 0, 2, 2] });
  });
});
