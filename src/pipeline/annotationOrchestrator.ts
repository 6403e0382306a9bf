/**
 * Two-stage auto-annotation: text-prompted detection, then one segmentation
 * call per detected box.
 *
 * Workflow:
 *   1. Detector finds boxes for the class prompt (progress 10-50%)
 *   2. Segmenter refines each box into a mask, in detection order (50-90%)
 *   3. Result cached under the (image, prompt) fingerprint and returned
 *
 * Cancellation is cooperative: the flag is checked before detection, after
 * detection, before each segmentation call and before the result is stored.
 * A model call already in flight always runs to completion.
 *
 * One orchestrator serves one caller at a time; a second run while one is in
 * flight is rejected.
 */
import type { DetectionEngine } from '../engines/detectionEngine';
import type { SegmentationEngine } from '../engines/segmentationEngine';
import type {
  AnnotationResult,
  BinaryMask,
  Device,
  ErrorListener,
  ProgressListener,
  RgbImage,
  RunOptions,
  Unsubscribe,
} from '../types';
import { CancellationToken } from './cancellation';
import { ResultCache } from './resultCache';
import { createPipelineStore, type RunOutcome } from '../stores/pipelineStore';
import {
  AnnotationError,
  LoadError,
  ModelsNotLoadedError,
  OrchestrationError,
  OrchestratorBusyError,
  describeServerError,
  type PipelineStage,
} from '../utils/errors';
import { fingerprint } from '../utils/image';
import { createLogger } from '../utils/logger';

const log = createLogger('orchestrator');

/** The slice of the detection engine the orchestrator drives. */
export type Detector = Pick<DetectionEngine, 'name' | 'load' | 'isLoaded' | 'detect' | 'onProgress'>;

/** The slice of the segmentation engine the orchestrator drives. */
export type Segmenter = Pick<SegmentationEngine, 'name' | 'load' | 'isLoaded' | 'predict' | 'onProgress'>;

export interface OrchestratorOptions {
  confidenceThreshold?: number;
  cacheMaxEntries?: number;  // 0 = unbounded
  cancellation?: CancellationToken;
}

type ProgressBand = { start: number; end: number };

export class AnnotationOrchestrator {
  readonly store = createPipelineStore();

  private readonly cache: ResultCache;
  private readonly token: CancellationToken;
  private readonly defaultThreshold: number;

  // Band of the overall progress the active engine call reports into
  private band: ProgressBand | null = null;

  private progressListeners = new Set<ProgressListener>();
  private errorListeners = new Set<ErrorListener>();
  private completeListeners = new Set<(result: AnnotationResult) => void>();
  private cancelledListeners = new Set<() => void>();
  private engineSubscriptions: Unsubscribe[];

  constructor(
    readonly detector: Detector,
    readonly segmenter: Segmenter,
    options: OrchestratorOptions = {}
  ) {
    this.cache = new ResultCache(options.cacheMaxEntries ?? 0);
    this.token = options.cancellation ?? new CancellationToken();
    this.defaultThreshold = options.confidenceThreshold ?? 0.3;

    const forward = (percentage: number, message: string) => {
      if (!this.band) return;
      const { start, end } = this.band;
      this.emitProgress(start + (percentage / 100) * (end - start), message);
    };
    this.engineSubscriptions = [detector.onProgress(forward), segmenter.onProgress(forward)];
  }

  // ==================== Notifications ====================

  onProgress(listener: ProgressListener): Unsubscribe {
    this.progressListeners.add(listener);
    return () => this.progressListeners.delete(listener);
  }

  onError(listener: ErrorListener): Unsubscribe {
    this.errorListeners.add(listener);
    return () => this.errorListeners.delete(listener);
  }

  onComplete(listener: (result: AnnotationResult) => void): Unsubscribe {
    this.completeListeners.add(listener);
    return () => this.completeListeners.delete(listener);
  }

  onCancelled(listener: () => void): Unsubscribe {
    this.cancelledListeners.add(listener);
    return () => this.cancelledListeners.delete(listener);
  }

  private emitProgress(percentage: number, message: string) {
    const clamped = Math.max(0, Math.min(100, Math.round(percentage)));
    this.store.getState().setProgress(clamped, message);
    for (const listener of this.progressListeners) listener(clamped, message);
  }

  private emitError(message: string) {
    this.store.getState().setError(message);
    log.error(message);
    for (const listener of this.errorListeners) listener(message);
  }

  // ==================== Models ====================

  /**
   * Load the detector, then the segmenter. Both are required for run().
   */
  async loadModels(detectorPath: string, segmenterPath: string, device: Device = 'cpu'): Promise<void> {
    const { setLoadingModels, setModelsLoaded } = this.store.getState();
    setLoadingModels(true);
    setModelsLoaded(false);
    this.emitProgress(0, 'Loading models...');

    let current: string = this.detector.name;
    try {
      this.emitProgress(10, `Loading ${this.detector.name}...`);
      this.band = { start: 10, end: 50 };
      await this.detector.load(detectorPath, device);

      current = this.segmenter.name;
      this.emitProgress(50, `Loading ${this.segmenter.name}...`);
      this.band = { start: 50, end: 90 };
      await this.segmenter.load(segmenterPath, device);

      this.band = null;
      setModelsLoaded(true);
      this.emitProgress(100, 'All models loaded');
    } catch (err) {
      this.band = null;
      const error =
        err instanceof LoadError
          ? err
          : new LoadError(`Failed to load ${current} model: ${describeServerError(err)}`, {}, { cause: err });
      this.emitError(error.message);
      throw error;
    } finally {
      setLoadingModels(false);
    }
  }

  isReady(): boolean {
    return this.detector.isLoaded() && this.segmenter.isLoaded();
  }

  // ==================== Pipeline ====================

  /**
   * Detect and segment everything named in `textPrompt`.
   *
   * Resolves to null when cancelled. Rejects with ModelsNotLoadedError before
   * loadModels() and with OrchestrationError when anything fails once the
   * run has started; nothing partial is ever cached or returned.
   */
  async run(image: RgbImage, textPrompt: string, options: RunOptions = {}): Promise<AnnotationResult | null> {
    const confidenceThreshold = options.confidenceThreshold ?? this.defaultThreshold;
    const useCache = options.useCache ?? true;

    if (this.token.isCancelled) {
      this.emitProgress(0, 'Operation cancelled');
      return null;
    }

    if (this.store.getState().status === 'running') {
      const error = new OrchestratorBusyError();
      this.emitError(error.message);
      throw error;
    }

    const missing = [this.detector, this.segmenter].filter((e) => !e.isLoaded()).map((e) => e.name);
    if (missing.length > 0) {
      const error = new ModelsNotLoadedError(missing);
      this.emitError(error.message);
      throw error;
    }

    const cacheKey = useCache ? fingerprint(image, textPrompt) : null;
    if (cacheKey) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        this.emitProgress(100, 'Retrieved from cache');
        this.emitComplete(cached);
        return cached;
      }
    }

    this.store.getState().start();
    let stage: PipelineStage = 'detection';

    // Whatever throws past this point, the run ends as failed, never stuck in running
    try {
      this.emitProgress(10, 'Starting auto-annotation...');

      // Stage A: detection
      const detections = await this.call({ start: 10, end: 50 }, () =>
        this.detector.detect(image, textPrompt, confidenceThreshold)
      );
      if (this.token.isCancelled) return this.abort('after detection');

      // Stage B: one segmentation per box, in detection order
      stage = 'segmentation';
      const { boxes } = detections;
      const masks: BinaryMask[] = [];
      this.emitProgress(50, `Refining ${boxes.length} detections into masks...`);

      for (let i = 0; i < boxes.length; i++) {
        if (this.token.isCancelled) return this.abort(`before segmenting object ${i + 1}/${boxes.length}`);

        const start = 50 + Math.floor((i / boxes.length) * 40);
        const end = 50 + Math.floor(((i + 1) / boxes.length) * 40);
        this.emitProgress(start, `Segmenting object ${i + 1}/${boxes.length}...`);

        const segmentation = await this.call({ start, end }, () =>
          this.segmenter.predict(image, { box: boxes[i] })
        );
        masks.push(segmentation.masks[0]);
      }

      if (this.token.isCancelled) return this.abort('before storing the result');

      const result: AnnotationResult = {
        detections,
        masks,
        metadata: {
          textPrompt,
          confidenceThreshold,
          numDetections: boxes.length,
        },
      };

      if (cacheKey) this.cache.set(cacheKey, result);

      this.emitProgress(100, 'Auto-annotation complete');
      this.finish('completed');
      log.info(`Annotated ${boxes.length} objects for "${textPrompt}"`);
      this.emitComplete(result);
      return result;
    } catch (err) {
      this.finish('failed');
      const reason = err instanceof AnnotationError ? err.message : describeServerError(err);
      const error = new OrchestrationError(`Auto-annotation failed during ${stage}: ${reason}`, stage, {
        cause: err,
      });
      this.emitError(error.message);
      throw error;
    }
  }

  /** Run one engine call with its progress mapped into `band`. */
  private async call<T>(band: ProgressBand, fn: () => Promise<T>): Promise<T> {
    this.band = band;
    try {
      return await fn();
    } finally {
      this.band = null;
    }
  }

  private abort(where: string): null {
    log.info(`Cancelled ${where}`);
    this.finish('cancelled');
    return null;
  }

  private finish(outcome: RunOutcome) {
    this.store.getState().finish(outcome);
  }

  private emitComplete(result: AnnotationResult) {
    for (const listener of this.completeListeners) listener(result);
  }

  // ==================== Control ====================

  /**
   * Request cancellation. Returns immediately; the running pipeline stops at
   * its next checkpoint. Stays set until resetCancellation().
   */
  cancel(): void {
    this.token.cancel();
    for (const listener of this.cancelledListeners) listener();
  }

  resetCancellation(): void {
    this.token.reset();
  }

  isCancelled(): boolean {
    return this.token.isCancelled;
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheSize(): number {
    return this.cache.size;
  }

  /** Stop listening to the engines. */
  dispose(): void {
    for (const unsubscribe of this.engineSubscriptions) unsubscribe();
    this.engineSubscriptions = [];
  }
}
