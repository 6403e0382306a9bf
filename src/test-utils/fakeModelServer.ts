import axios, { AxiosError, type AxiosAdapter, type AxiosResponse } from 'axios';
import { createModelServerClient } from '../api/client';
import type { RgbImage } from '../types';

export interface FakeReply {
  status?: number;
  data?: unknown;
  timeout?: boolean;
}

export type RouteHandler = (body: unknown) => FakeReply;

export interface RecordedCall {
  method: string;
  url: string;
  body: unknown;
}

/**
 * In-process inference server: an axios adapter that dispatches on
 * "METHOD /path" and records every request body.
 */
export function createFakeModelServer(routes: Partial<Record<string, RouteHandler>>) {
  const calls: RecordedCall[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const method = (config.method ?? 'get').toUpperCase();
    const url = config.url ?? '';
    const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : undefined;
    calls.push({ method, url, body });

    const handler = routes[`${method} ${url}`];
    const reply: FakeReply = handler ? handler(body) : { status: 404, data: { detail: `No route ${method} ${url}` } };

    if (reply.timeout) {
      throw new AxiosError(`timeout of ${config.timeout ?? 0}ms exceeded`, AxiosError.ECONNABORTED, config);
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status ?? 200,
      statusText: 'OK',
      headers: {},
      config,
    };
    if (response.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${response.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response
      );
    }
    return response;
  };

  const instance = axios.create({ adapter });
  return {
    calls,
    client: createModelServerClient({ instance }),
    /** Bodies sent to one route, in order. */
    bodiesFor: (route: string) => calls.filter((c) => `${c.method} ${c.url}` === route).map((c) => c.body),
  };
}

export const loaded = (modelId: string, device = 'cpu'): RouteHandler => () => ({
  data: { model_id: modelId, device, loaded: true },
});

/** Solid-colour RGB test image. */
export function solidImage(width: number, height: number, value = 128): RgbImage {
  return { width, height, channels: 3, data: new Uint8Array(width * height * 3).fill(value) };
}
