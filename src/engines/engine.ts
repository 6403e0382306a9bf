/**
 * Inference engine contract.
 *
 * Every loadable model (detector, segmenter) exposes the same lifecycle:
 * load → predict* → unload, with progress and error notifications. The
 * orchestrator only depends on this surface.
 *
 * State machine: unloaded → loading → loaded | failed; loaded → unloaded.
 * predict is valid only in `loaded`.
 */
import type { ModelFamily, ModelServerClient, StatusResponse } from '../api/client';
import type {
  Device,
  ErrorListener,
  ModelHandle,
  ProgressListener,
  RgbImage,
  Unsubscribe,
} from '../types';
import { createEngineStore, selectHandle, type EngineStore } from '../stores/engineStore';
import {
  AnnotationError,
  InferenceError,
  LoadError,
  ModelNotLoadedError,
  describeServerError,
  isTimeoutError,
} from '../utils/errors';
import type { Logger } from '../utils/logger';

export interface InferenceEngine<TRequest, TResult> {
  readonly name: string;
  load(modelPath: string, device?: Device): Promise<ModelHandle>;
  unload(): Promise<void>;
  refreshStatus(): Promise<ModelHandle>;
  predict(image: RgbImage, request: TRequest): Promise<TResult>;
  isLoaded(): boolean;
  getDevice(): Device;
  getHandle(): ModelHandle;

  onProgress(listener: ProgressListener): Unsubscribe;
  onError(listener: ErrorListener): Unsubscribe;
  onModelLoaded(listener: () => void): Unsubscribe;
  onPredictionComplete(listener: (result: TResult) => void): Unsubscribe;
}

function subscribe<T>(listeners: Set<T>, listener: T): Unsubscribe {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

/**
 * Lifecycle bookkeeping shared by the concrete engines: the state store and
 * the four notification channels.
 */
export class EngineLifecycle<TResult> {
  readonly store: EngineStore = createEngineStore();

  private progressListeners = new Set<ProgressListener>();
  private errorListeners = new Set<ErrorListener>();
  private loadedListeners = new Set<() => void>();
  private completeListeners = new Set<(result: TResult) => void>();

  constructor(
    private readonly engineName: string,
    private readonly logger: Logger
  ) {}

  onProgress(listener: ProgressListener): Unsubscribe {
    return subscribe(this.progressListeners, listener);
  }

  onError(listener: ErrorListener): Unsubscribe {
    return subscribe(this.errorListeners, listener);
  }

  onModelLoaded(listener: () => void): Unsubscribe {
    return subscribe(this.loadedListeners, listener);
  }

  onPredictionComplete(listener: (result: TResult) => void): Unsubscribe {
    return subscribe(this.completeListeners, listener);
  }

  emitProgress(percentage: number, message: string): void {
    const clamped = Math.max(0, Math.min(100, Math.round(percentage)));
    this.store.getState().setProgress(clamped, message);
    for (const listener of this.progressListeners) listener(clamped, message);
  }

  emitError(message: string): void {
    this.store.getState().setError(message);
    this.logger.error(message);
    for (const listener of this.errorListeners) listener(message);
  }

  emitPredictionComplete(result: TResult): void {
    for (const listener of this.completeListeners) listener(result);
  }

  isLoaded(): boolean {
    const { loadedState, modelRef } = this.store.getState();
    return loadedState === 'loaded' && modelRef !== null;
  }

  getHandle(): ModelHandle {
    return selectHandle(this.store.getState());
  }

  /** Throws (and reports) ModelNotLoadedError outside the `loaded` state. */
  requireLoaded(): void {
    if (!this.isLoaded()) {
      const error = new ModelNotLoadedError(`${this.engineName} model not loaded. Call load() first.`);
      this.emitError(error.message);
      throw error;
    }
  }

  /**
   * Report a failure on the error channel and return the error to throw.
   * Pipeline errors pass through; anything else becomes an InferenceError.
   */
  fail(action: string, err: unknown): AnnotationError {
    if (err instanceof AnnotationError) {
      this.emitError(`${action} failed: ${err.message}`);
      return err;
    }
    const message = `${action} failed: ${describeServerError(err)}`;
    this.emitError(message);
    return new InferenceError(message, isTimeoutError(err) ? 'TIMEOUT' : 'INFERENCE_FAILED', {
      engine: this.engineName,
    }, { cause: err });
  }

  /**
   * Load the model on the inference server. A device other than the one
   * requested means the accelerator was unavailable: warn and carry on.
   */
  async load(
    client: ModelServerClient,
    family: ModelFamily,
    modelPath: string,
    device: Device
  ): Promise<ModelHandle> {
    if (!modelPath.trim()) {
      const message = `Failed to load ${this.engineName} model: empty model path`;
      this.store.getState().failLoad(message);
      this.emitError(message);
      throw new LoadError(message, { family });
    }

    this.store.getState().beginLoad(modelPath, device);
    this.emitProgress(10, `Loading ${this.engineName} model...`);

    try {
      const response = await client.loadModel(family, modelPath, device);
      if (!response.loaded) {
        throw new Error('server reported the model as not loaded');
      }
      if (response.device !== device) {
        const warning = `${device} unavailable, falling back to ${response.device}`;
        this.logger.warn(`${this.engineName}: ${warning}`);
        this.emitProgress(50, `Warning: ${warning}`);
      }
      this.store.getState().completeLoad(response.model_id, response.device);
      this.emitProgress(100, `${this.engineName} model loaded`);
      this.logger.info(`${this.engineName} loaded ${modelPath} on ${response.device}`);
      for (const listener of this.loadedListeners) listener();
      return this.getHandle();
    } catch (err) {
      const message = `Failed to load ${this.engineName} model: ${describeServerError(err)}`;
      this.store.getState().failLoad(message);
      this.emitError(message);
      throw new LoadError(message, { family, modelPath, device }, { cause: err });
    }
  }

  /**
   * Reconcile the local handle with the server, which may have dropped the
   * model (restart, eviction) or moved it to another device.
   */
  async refreshStatus(client: ModelServerClient, family: ModelFamily): Promise<ModelHandle> {
    let status: StatusResponse;
    try {
      status = await client.getStatus(family);
    } catch (err) {
      throw this.fail('Status check', err);
    }

    const { loadedState, modelRef, device, unload, completeLoad } = this.store.getState();
    if (loadedState !== 'loaded' || modelRef === null) return this.getHandle();

    if (!status.loaded) {
      this.logger.warn(`${this.engineName} model is no longer loaded on the server`);
      unload();
    } else if (status.device && status.device !== device) {
      this.logger.warn(`${this.engineName} moved from ${device} to ${status.device}`);
      completeLoad(modelRef, status.device);
    }
    return this.getHandle();
  }

  async unload(client: ModelServerClient, family: ModelFamily): Promise<void> {
    if (this.store.getState().loadedState !== 'loaded') {
      this.store.getState().unload();
      return;
    }
    try {
      await client.unloadModel(family);
    } finally {
      this.store.getState().unload();
      this.emitProgress(100, 'Model unloaded');
    }
  }
}
