import type { ModelServerClient } from '../api/client';
import type {
  BinaryMask,
  Device,
  ErrorListener,
  ModelHandle,
  PointPrompt,
  Polygon,
  ProgressListener,
  RgbImage,
  SegmentationPrompt,
  SegmentationResult,
  Unsubscribe,
} from '../types';
import { EngineLifecycle, type InferenceEngine } from './engine';
import { InferenceError, InvalidPromptError } from '../utils/errors';
import { assertMaskMatchesImage, assertRgbImage, imageKey } from '../utils/image';
import { maskToPolygon, smoothMask } from '../utils/mask';
import { decodeRLE } from '../utils/rle';
import { createLogger } from '../utils/logger';

const log = createLogger('segmenter');

function assertPrompt(prompt: SegmentationPrompt) {
  const hasPoints = prompt.points !== undefined && prompt.points.length > 0;
  if (!hasPoints && !prompt.box) {
    throw new InvalidPromptError('Segmentation needs point prompts, a box prompt, or both');
  }
  for (const point of prompt.points ?? []) {
    if (point.label !== 0 && point.label !== 1) {
      throw new InvalidPromptError(`Point label must be 0 or 1, got ${String(point.label)}`);
    }
  }
  if (prompt.box) {
    const [x1, y1, x2, y2] = prompt.box;
    if (!(x1 < x2 && y1 < y2)) {
      throw new InvalidPromptError(`Box must satisfy x1 < x2 and y1 < y2, got [${prompt.box.join(', ')}]`);
    }
  }
}

/**
 * Index of the highest-scoring candidate; ties keep the first.
 */
export function argmax(scores: number[]): number {
  let best = 0;
  for (let i = 1; i < scores.length; i++) {
    if (scores[i] > scores[best]) best = i;
  }
  return best;
}

/**
 * Promptable segmenter running on the inference server (SAM2 by default).
 * Every request carries the image's content hash so the server can reuse
 * its image embedding across prompts on the same image.
 */
export class SegmentationEngine implements InferenceEngine<SegmentationPrompt, SegmentationResult> {
  readonly name = 'Segmenter';
  private readonly lifecycle = new EngineLifecycle<SegmentationResult>(this.name, log);

  constructor(private readonly client: ModelServerClient) {}

  get store() {
    return this.lifecycle.store;
  }

  // ==================== Lifecycle ====================

  load(modelPath: string, device: Device = 'cpu'): Promise<ModelHandle> {
    return this.lifecycle.load(this.client, 'segmenter', modelPath, device);
  }

  unload(): Promise<void> {
    return this.lifecycle.unload(this.client, 'segmenter');
  }

  refreshStatus(): Promise<ModelHandle> {
    return this.lifecycle.refreshStatus(this.client, 'segmenter');
  }

  isLoaded(): boolean {
    return this.lifecycle.isLoaded();
  }

  getDevice(): Device {
    return this.lifecycle.getHandle().device;
  }

  getHandle(): ModelHandle {
    return this.lifecycle.getHandle();
  }

  onProgress(listener: ProgressListener): Unsubscribe {
    return this.lifecycle.onProgress(listener);
  }

  onError(listener: ErrorListener): Unsubscribe {
    return this.lifecycle.onError(listener);
  }

  onModelLoaded(listener: () => void): Unsubscribe {
    return this.lifecycle.onModelLoaded(listener);
  }

  onPredictionComplete(listener: (result: SegmentationResult) => void): Unsubscribe {
    return this.lifecycle.onPredictionComplete(listener);
  }

  // ==================== Inference ====================

  /**
   * Segment the region described by point and/or box prompts.
   * Without `multimaskOutput` only the best-scoring candidate is returned.
   */
  async predict(image: RgbImage, prompt: SegmentationPrompt): Promise<SegmentationResult> {
    this.lifecycle.requireLoaded();
    let result: SegmentationResult;
    try {
      assertRgbImage(image);
      assertPrompt(prompt);

      this.lifecycle.emitProgress(20, 'Preprocessing image...');
      // Hashed per call: callers may reuse one buffer for successive frames
      const key = imageKey(image);
      this.lifecycle.emitProgress(40, 'Generating embeddings...');
      this.lifecycle.emitProgress(60, 'Running segmentation...');
      const response = await this.client.segment(image, key, prompt.points, prompt.box);

      this.lifecycle.emitProgress(90, 'Post-processing...');
      if (response.masks.length === 0) {
        throw new InferenceError('Segmenter returned no mask candidates', 'INVALID_RESPONSE');
      }
      if (response.masks.length !== response.scores.length) {
        throw new InferenceError(
          `Segmenter returned ${response.masks.length} masks and ${response.scores.length} scores`,
          'INVALID_RESPONSE'
        );
      }

      const masks = response.masks.map((rle) => {
        const mask = decodeRLE(rle);
        assertMaskMatchesImage(mask, image);
        return mask;
      });

      if (prompt.multimaskOutput) {
        result = { masks, scores: response.scores };
      } else {
        const best = argmax(response.scores);
        result = { masks: [masks[best]], scores: [response.scores[best]] };
      }
    } catch (err) {
      throw this.lifecycle.fail('Prediction', err);
    }

    this.lifecycle.emitProgress(100, 'Segmentation complete');
    this.lifecycle.emitPredictionComplete(result);
    return result;
  }

  /**
   * Same prompt on every image, one after the other.
   */
  async predictBatch(images: RgbImage[], prompt: SegmentationPrompt): Promise<SegmentationResult[]> {
    const results: SegmentationResult[] = [];
    const total = images.length;

    for (let i = 0; i < total; i++) {
      this.lifecycle.emitProgress(Math.floor((i / total) * 100), `Processing image ${i + 1}/${total}...`);
      results.push(await this.predict(images[i], prompt));
    }
    return results;
  }

  /**
   * Re-run prediction with corrective points: positives as foreground,
   * negatives as background.
   */
  async refineMask(
    image: RgbImage,
    initialMask: BinaryMask,
    positivePoints: [number, number][] = [],
    negativePoints: [number, number][] = []
  ): Promise<SegmentationResult> {
    try {
      assertMaskMatchesImage(initialMask, image);
    } catch (err) {
      throw this.lifecycle.fail('Refinement', err);
    }

    const points: PointPrompt[] = [
      ...positivePoints.map(([x, y]): PointPrompt => ({ x, y, label: 1 })),
      ...negativePoints.map(([x, y]): PointPrompt => ({ x, y, label: 0 })),
    ];
    return this.predict(image, { points });
  }

  // ==================== Post-processing ====================

  smoothMask(mask: BinaryMask, kernelSize = 5, iterations = 2): BinaryMask {
    return smoothMask(mask, kernelSize, iterations);
  }

  maskToPolygon(mask: BinaryMask, epsilonFactor = 0.001): Polygon[] {
    return maskToPolygon(mask, epsilonFactor);
  }
}
