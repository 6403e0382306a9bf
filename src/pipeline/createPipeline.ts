import { createModelServerClient, type ModelServerClient } from '../api/client';
import type { PipelineConfig } from '../config';
import { DetectionEngine } from '../engines/detectionEngine';
import { SegmentationEngine } from '../engines/segmentationEngine';
import { setLogLevel } from '../utils/logger';
import { AnnotationOrchestrator } from './annotationOrchestrator';
import { BatchRunner } from './batchRunner';

export interface AnnotationPipeline {
  client: ModelServerClient;
  detector: DetectionEngine;
  segmenter: SegmentationEngine;
  orchestrator: AnnotationOrchestrator;
  batch: BatchRunner;
  /** Load the configured detector and segmenter on the configured device. */
  loadModels: () => Promise<void>;
}

/**
 * Wire engines, orchestrator and batch runner against one inference server.
 * Pass `client` to reuse an existing connection (tests pass a fake).
 */
export function createAnnotationPipeline(
  config: PipelineConfig,
  client: ModelServerClient = createModelServerClient({
    baseURL: config.modelServerUrl,
    timeoutMs: config.inferenceTimeoutMs,
  })
): AnnotationPipeline {
  setLogLevel(config.logLevel);

  const detector = new DetectionEngine(client);
  const segmenter = new SegmentationEngine(client);
  const orchestrator = new AnnotationOrchestrator(detector, segmenter, {
    confidenceThreshold: config.confidenceThreshold,
    cacheMaxEntries: config.cacheMaxEntries,
  });
  const batch = new BatchRunner(orchestrator);

  return {
    client,
    detector,
    segmenter,
    orchestrator,
    batch,
    loadModels: () => orchestrator.loadModels(config.detectorModel, config.segmenterModel, config.device),
  };
}
