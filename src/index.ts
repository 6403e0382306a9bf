export * from './types';
export * from './utils/errors';
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './utils/logger';
export { loadConfig, loadConfigFromEnvFile, type PipelineConfig } from './config';
export { createModelServerClient, type ModelServerClient, type ModelServerClientOptions, type ModelFamily } from './api/client';
export { decodeRLE, encodeRLE, type RLEMask } from './utils/rle';
export { bboxToMask, emptyMask, maskArea, maskToPolygon, smoothMask } from './utils/mask';
export { fingerprint, imageKey, loadRgbImage } from './utils/image';
export { EngineLifecycle, type InferenceEngine } from './engines/engine';
export { DetectionEngine, DEFAULT_CONFIDENCE_THRESHOLD, parseClassPrompt } from './engines/detectionEngine';
export { SegmentationEngine } from './engines/segmentationEngine';
export { CancellationToken } from './pipeline/cancellation';
export { ResultCache } from './pipeline/resultCache';
export {
  AnnotationOrchestrator,
  type Detector,
  type OrchestratorOptions,
  type Segmenter,
} from './pipeline/annotationOrchestrator';
export { BatchRunner, type BatchProgressListener, type BatchRunnerOptions } from './pipeline/batchRunner';
export { createAnnotationPipeline, type AnnotationPipeline } from './pipeline/createPipeline';
