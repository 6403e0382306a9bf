import path from 'node:path';
import type { AnnotationOrchestrator } from './annotationOrchestrator';
import { CancellationToken } from './cancellation';
import { createBatchStore, selectSummary } from '../stores/batchStore';
import type { AnnotationResult, BatchItemOutcome, BatchSummary, RgbImage, RunOptions, Unsubscribe } from '../types';
import { loadRgbImage } from '../utils/image';
import { createLogger } from '../utils/logger';

const log = createLogger('batch');

export type BatchProgressListener = (current: number, total: number, message: string) => void;

export interface BatchRunnerOptions {
  loadImage?: (imagePath: string) => Promise<RgbImage>;
  runOptions?: RunOptions;
}

/**
 * Runs the orchestrator over a list of image files, one at a time.
 * A failing image is recorded and skipped; it never stops the batch.
 */
export class BatchRunner {
  readonly store = createBatchStore();

  private readonly token = new CancellationToken();
  private readonly loadImage: (imagePath: string) => Promise<RgbImage>;
  private readonly runOptions: RunOptions;

  private progressListeners = new Set<BatchProgressListener>();
  private itemListeners = new Set<(outcome: BatchItemOutcome, result: AnnotationResult | null) => void>();
  private completeListeners = new Set<(summary: BatchSummary) => void>();

  constructor(
    private readonly orchestrator: Pick<AnnotationOrchestrator, 'run'>,
    options: BatchRunnerOptions = {}
  ) {
    this.loadImage = options.loadImage ?? loadRgbImage;
    this.runOptions = options.runOptions ?? {};
  }

  onProgress(listener: BatchProgressListener): Unsubscribe {
    this.progressListeners.add(listener);
    return () => this.progressListeners.delete(listener);
  }

  onItemComplete(listener: (outcome: BatchItemOutcome, result: AnnotationResult | null) => void): Unsubscribe {
    this.itemListeners.add(listener);
    return () => this.itemListeners.delete(listener);
  }

  onBatchComplete(listener: (summary: BatchSummary) => void): Unsubscribe {
    this.completeListeners.add(listener);
    return () => this.completeListeners.delete(listener);
  }

  /** Stop before the next image. The image in flight finishes. */
  cancel(): void {
    this.token.cancel();
  }

  async run(imagePaths: string[], textPrompt: string): Promise<BatchSummary> {
    const { begin, record, markCancelled, end } = this.store.getState();
    const total = imagePaths.length;
    begin(total);
    log.info(`Starting batch of ${total} images for "${textPrompt}"`);

    try {
      for (let i = 0; i < total; i++) {
        if (this.token.isCancelled) {
          markCancelled();
          break;
        }

        const imagePath = imagePaths[i];
        const name = path.basename(imagePath);
        let outcome: BatchItemOutcome;
        let result: AnnotationResult | null = null;
        let interrupted = false;

        try {
          const image = await this.loadImage(imagePath);
          result = await this.orchestrator.run(image, textPrompt, this.runOptions);
          if (result) {
            outcome = { path: imagePath, success: true, message: `Processed ${name}` };
          } else {
            interrupted = true;
            outcome = { path: imagePath, success: false, message: `Cancelled ${name}` };
          }
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          log.warn(`Failed ${name}`, err);
          outcome = { path: imagePath, success: false, message: `Failed ${name}: ${reason}` };
        }

        record(outcome);
        for (const listener of this.itemListeners) listener(outcome, result);
        for (const listener of this.progressListeners) listener(i + 1, total, outcome.message);

        // The orchestrator was cancelled under us; every later run would return null too
        if (interrupted) {
          markCancelled();
          break;
        }
      }
    } finally {
      end();
      this.token.reset();
    }

    const summary = selectSummary(this.store.getState());
    log.info(`Batch done: ${summary.succeeded} succeeded, ${summary.failed} failed of ${summary.processed}`);
    for (const listener of this.completeListeners) listener(summary);
    return summary;
  }
}
