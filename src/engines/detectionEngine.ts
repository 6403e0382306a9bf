import type { ModelServerClient } from '../api/client';
import type {
  BinaryMask,
  Box,
  DetectionOutput,
  DetectionRequest,
  DetectionResult,
  Device,
  ErrorListener,
  GroundedResult,
  ModelHandle,
  ProgressListener,
  RgbImage,
  Unsubscribe,
} from '../types';
import { EngineLifecycle, type InferenceEngine } from './engine';
import { InvalidPromptError } from '../utils/errors';
import { assertRgbImage } from '../utils/image';
import { bboxToMask } from '../utils/mask';
import { createLogger } from '../utils/logger';

const log = createLogger('detector');

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.3;

/** Split a comma-separated class prompt into trimmed, non-empty class names. */
export function parseClassPrompt(textPrompt: string): string[] {
  return textPrompt
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

function assertThreshold(confidenceThreshold: number) {
  if (!Number.isFinite(confidenceThreshold) || confidenceThreshold < 0 || confidenceThreshold > 1) {
    throw new InvalidPromptError(`confidenceThreshold must be in [0, 1], got ${confidenceThreshold}`);
  }
}

/**
 * Clamp a box to the image; null when nothing of it is left.
 */
function clampBox(box: Box, width: number, height: number): Box | null {
  const x1 = Math.max(0, Math.min(width, Math.min(box[0], box[2])));
  const x2 = Math.max(0, Math.min(width, Math.max(box[0], box[2])));
  const y1 = Math.max(0, Math.min(height, Math.min(box[1], box[3])));
  const y2 = Math.max(0, Math.min(height, Math.max(box[1], box[3])));
  if (x2 <= x1 || y2 <= y1) return null;
  return [x1, y1, x2, y2];
}

/**
 * Text-prompted object detector running on the inference server
 * (Florence-2 by default).
 */
export class DetectionEngine implements InferenceEngine<DetectionRequest, DetectionOutput> {
  readonly name = 'Detector';
  private readonly lifecycle = new EngineLifecycle<DetectionOutput>(this.name, log);

  constructor(private readonly client: ModelServerClient) {}

  get store() {
    return this.lifecycle.store;
  }

  // ==================== Lifecycle ====================

  load(modelPath: string, device: Device = 'cpu'): Promise<ModelHandle> {
    return this.lifecycle.load(this.client, 'detector', modelPath, device);
  }

  unload(): Promise<void> {
    return this.lifecycle.unload(this.client, 'detector');
  }

  refreshStatus(): Promise<ModelHandle> {
    return this.lifecycle.refreshStatus(this.client, 'detector');
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

  onPredictionComplete(listener: (result: DetectionOutput) => void): Unsubscribe {
    return this.lifecycle.onPredictionComplete(listener);
  }

  // ==================== Inference ====================

  /**
   * Unified entry point; dispatches on the request's task.
   */
  async predict(image: RgbImage, request: DetectionRequest): Promise<DetectionOutput> {
    switch (request.task) {
      case 'detection':
        return this.detect(image, request.textPrompt, request.confidenceThreshold);
      case 'grounded':
        return this.groundedDetection(image, request.phrase, request.confidenceThreshold);
      case 'caption':
        return { caption: await this.generateCaption(image, request.detailed) };
    }
  }

  /**
   * Detect every instance of the comma-separated classes in `textPrompt`.
   * Nothing scoring below `confidenceThreshold` is returned, whatever the
   * server sends back.
   */
  async detect(
    image: RgbImage,
    textPrompt: string,
    confidenceThreshold = DEFAULT_CONFIDENCE_THRESHOLD
  ): Promise<DetectionResult> {
    this.lifecycle.requireLoaded();
    let result: DetectionResult;
    try {
      assertRgbImage(image);
      assertThreshold(confidenceThreshold);
      const classes = parseClassPrompt(textPrompt);
      if (classes.length === 0) {
        throw new InvalidPromptError('Text prompt must name at least one class');
      }

      this.lifecycle.emitProgress(20, 'Preprocessing image...');
      this.lifecycle.emitProgress(60, 'Running object detection...');
      const response = await this.client.detect(image, classes.join(', '), confidenceThreshold);

      this.lifecycle.emitProgress(90, 'Post-processing...');
      if (response.labels.length !== response.boxes.length || response.scores.length !== response.boxes.length) {
        throw new Error(
          `detector returned ${response.boxes.length} boxes, ${response.labels.length} labels, ${response.scores.length} scores`
        );
      }

      const boxes: Box[] = [];
      const labels: string[] = [];
      const scores: number[] = [];
      response.boxes.forEach((raw, i) => {
        const score = response.scores[i];
        if (score < confidenceThreshold) return;
        const box = clampBox(raw, image.width, image.height);
        if (!box) {
          log.debug(`Dropping degenerate box ${JSON.stringify(raw)}`);
          return;
        }
        boxes.push(box);
        labels.push(response.labels[i]);
        scores.push(Math.max(0, Math.min(1, score)));
      });
      result = Object.freeze({ boxes, labels, scores });
    } catch (err) {
      throw this.lifecycle.fail('Detection', err);
    }

    this.lifecycle.emitProgress(100, 'Detection complete');
    this.lifecycle.emitPredictionComplete(result);
    return result;
  }

  /**
   * Run detection or grounding with the same prompt on every image, one after
   * the other. Captioning has no batch form.
   */
  async predictBatch(
    images: RgbImage[],
    textPrompt: string,
    task: DetectionRequest['task'] = 'detection',
    confidenceThreshold = DEFAULT_CONFIDENCE_THRESHOLD
  ): Promise<Array<DetectionResult | GroundedResult>> {
    this.lifecycle.requireLoaded();
    if (task !== 'detection' && task !== 'grounded') {
      throw this.lifecycle.fail('Batch prediction', new InvalidPromptError(`Unsupported batch task: ${task}`));
    }

    const results: Array<DetectionResult | GroundedResult> = [];
    const total = images.length;
    for (let i = 0; i < total; i++) {
      this.lifecycle.emitProgress(Math.floor((i / total) * 100), `Processing image ${i + 1}/${total}...`);
      results.push(
        task === 'detection'
          ? await this.detect(images[i], textPrompt, confidenceThreshold)
          : await this.groundedDetection(images[i], textPrompt, confidenceThreshold)
      );
    }
    return results;
  }

  /**
   * Boxes for one free-text phrase ("red car", "person walking").
   */
  async groundedDetection(
    image: RgbImage,
    phrase: string,
    confidenceThreshold = DEFAULT_CONFIDENCE_THRESHOLD
  ): Promise<GroundedResult> {
    this.lifecycle.requireLoaded();
    let result: GroundedResult;
    try {
      assertRgbImage(image);
      assertThreshold(confidenceThreshold);
      const trimmed = phrase.trim();
      if (!trimmed) {
        throw new InvalidPromptError('phrase required for grounded detection');
      }

      this.lifecycle.emitProgress(20, `Grounding phrase: ${trimmed}...`);
      const response = await this.client.groundedDetect(image, trimmed, confidenceThreshold);
      this.lifecycle.emitProgress(60, 'Running grounded detection...');

      const boxes: Box[] = [];
      const scores: number[] = [];
      response.boxes.forEach((raw, i) => {
        const score = response.scores[i] ?? 0;
        const box = clampBox(raw, image.width, image.height);
        if (box && score >= confidenceThreshold) {
          boxes.push(box);
          scores.push(score);
        }
      });
      result = { phrase: trimmed, boxes, scores };
    } catch (err) {
      throw this.lifecycle.fail('Grounded detection', err);
    }

    this.lifecycle.emitProgress(100, 'Grounding complete');
    this.lifecycle.emitPredictionComplete(result);
    return result;
  }

  async generateCaption(image: RgbImage, detailed = false): Promise<string> {
    this.lifecycle.requireLoaded();
    let caption: string;
    try {
      assertRgbImage(image);
      this.lifecycle.emitProgress(20, 'Generating caption...');
      caption = await this.client.caption(image, detailed);
      this.lifecycle.emitProgress(70, 'Processing caption...');
    } catch (err) {
      throw this.lifecycle.fail('Caption generation', err);
    }

    this.lifecycle.emitProgress(100, 'Caption generated');
    this.lifecycle.emitPredictionComplete({ caption });
    return caption;
  }

  /**
   * Rectangle masks for boxes, for consumers that want a mask per box
   * without running the segmenter.
   */
  bboxToMask(boxes: Box[], height: number, width: number): BinaryMask[] {
    return bboxToMask(boxes, height, width);
  }
}
