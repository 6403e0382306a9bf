import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Box, Device, PointPrompt, RgbImage } from '../types';
import type { RLEMask } from '../utils/rle';
import { InferenceError } from '../utils/errors';

export type ModelFamily = 'detector' | 'segmenter';

// ==================== Schemas ====================

const DeviceSchema = z.enum(['cpu', 'cuda', 'mps']);

const BoxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

const LoadResponseSchema = z.object({
  model_id: z.string().min(1),
  device: DeviceSchema,
  loaded: z.boolean(),
});

const StatusResponseSchema = z.object({
  loaded: z.boolean(),
  device: DeviceSchema.nullable().optional(),
});

const DetectResponseSchema = z.object({
  boxes: z.array(BoxSchema),
  labels: z.array(z.string()),
  scores: z.array(z.number()),
});

const GroundedResponseSchema = z.object({
  boxes: z.array(BoxSchema),
  scores: z.array(z.number()),
});

const CaptionResponseSchema = z.object({
  caption: z.string(),
});

const RLESchema = z.object({
  counts: z.union([z.array(z.number().int()), z.string()]),
  size: z.tuple([z.number().int().positive(), z.number().int().positive()]),
});

const SegmentResponseSchema = z.object({
  masks: z.array(RLESchema),
  scores: z.array(z.number()),
});

export type LoadResponse = z.infer<typeof LoadResponseSchema>;
export type StatusResponse = z.infer<typeof StatusResponseSchema>;
export type DetectResponse = z.infer<typeof DetectResponseSchema>;
export type GroundedResponse = z.infer<typeof GroundedResponseSchema>;
export type SegmentResponse = { masks: RLEMask[]; scores: number[] };

function parse<S extends z.ZodTypeAny>(schema: S, data: unknown, endpoint: string): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new InferenceError(
      `Malformed response from ${endpoint}: ${result.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`,
      'INVALID_RESPONSE',
      { endpoint }
    );
  }
  return result.data;
}

// ==================== Payloads ====================

interface ImagePayload {
  data: string;  // base64 of the raw interleaved pixels
  width: number;
  height: number;
  channels: number;
}

function toImagePayload(image: RgbImage): ImagePayload {
  return {
    data: Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength).toString('base64'),
    width: image.width,
    height: image.height,
    channels: image.channels,
  };
}

// ==================== Client ====================

export interface ModelServerClientOptions {
  baseURL?: string;
  timeoutMs?: number;  // 0 = no timeout
  instance?: AxiosInstance;
}

export interface ModelServerClient {
  loadModel: (family: ModelFamily, modelPath: string, device: Device) => Promise<LoadResponse>;
  unloadModel: (family: ModelFamily) => Promise<void>;
  getStatus: (family: ModelFamily) => Promise<StatusResponse>;
  detect: (image: RgbImage, textPrompt: string, confidenceThreshold: number) => Promise<DetectResponse>;
  groundedDetect: (image: RgbImage, phrase: string, confidenceThreshold: number) => Promise<GroundedResponse>;
  caption: (image: RgbImage, detailed: boolean) => Promise<string>;
  segment: (
    image: RgbImage,
    imageKey: string,
    points: PointPrompt[] | undefined,
    box: Box | undefined
  ) => Promise<SegmentResponse>;
}

export function createModelServerClient(options: ModelServerClientOptions = {}): ModelServerClient {
  const api = options.instance ?? axios.create({
    baseURL: options.baseURL ?? 'http://127.0.0.1:8000',
    timeout: options.timeoutMs ?? 0,
    headers: {
      'Content-Type': 'application/json',
    },
  });

  return {
    // ==================== Models ====================

    async loadModel(family, modelPath, device) {
      const response = await api.post('/models/load', {
        family,
        model_path: modelPath,
        device,
      });
      return parse(LoadResponseSchema, response.data, '/models/load');
    },

    async unloadModel(family) {
      await api.post('/models/unload', { family });
    },

    async getStatus(family) {
      const response = await api.get(`/models/${family}/status`);
      return parse(StatusResponseSchema, response.data, `/models/${family}/status`);
    },

    // ==================== Detection ====================

    async detect(image, textPrompt, confidenceThreshold) {
      const response = await api.post('/detect', {
        image: toImagePayload(image),
        text_prompt: textPrompt,
        confidence_threshold: confidenceThreshold,
      });
      return parse(DetectResponseSchema, response.data, '/detect');
    },

    async groundedDetect(image, phrase, confidenceThreshold) {
      const response = await api.post('/grounded', {
        image: toImagePayload(image),
        phrase,
        confidence_threshold: confidenceThreshold,
      });
      return parse(GroundedResponseSchema, response.data, '/grounded');
    },

    async caption(image, detailed) {
      const response = await api.post('/caption', {
        image: toImagePayload(image),
        detailed,
      });
      return parse(CaptionResponseSchema, response.data, '/caption').caption;
    },

    // ==================== Segmentation ====================

    // The server always returns its full candidate set; selection happens client-side
    async segment(image, imageKey, points, box) {
      const response = await api.post('/segment', {
        image: toImagePayload(image),
        image_key: imageKey,
        points: points?.map((p) => [p.x, p.y, p.label]) ?? null,
        box: box ?? null,
        multimask_output: true,
      });
      return parse(SegmentResponseSchema, response.data, '/segment');
    },
  };
}
