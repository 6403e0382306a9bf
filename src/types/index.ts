// Types for the auto-annotation pipeline

export type Device = 'cpu' | 'cuda' | 'mps';

export type LoadedState = 'unloaded' | 'loading' | 'loaded' | 'failed';

export interface ModelHandle {
  device: Device;
  loadedState: LoadedState;
  modelRef: string | null;  // id of the model on the inference server
}

/** Interleaved, row-major pixel grid. */
export interface RgbImage {
  width: number;
  height: number;
  channels: number;
  data: Uint8Array;
}

/** Row-major, one byte per pixel (0 or 1). */
export interface BinaryMask {
  width: number;
  height: number;
  data: Uint8Array;
}

export type Box = [number, number, number, number];  // [x1, y1, x2, y2]

export interface DetectionResult {
  boxes: Box[];
  labels: string[];
  scores: number[];
}

export interface GroundedResult {
  phrase: string;
  boxes: Box[];
  scores: number[];
}

export type DetectionRequest =
  | { task: 'detection'; textPrompt: string; confidenceThreshold?: number }
  | { task: 'grounded'; phrase: string; confidenceThreshold?: number }
  | { task: 'caption'; detailed?: boolean };

export type DetectionOutput = DetectionResult | GroundedResult | { caption: string };

// Point prompt for the segmenter: 1 = foreground, 0 = background
export interface PointPrompt {
  x: number;
  y: number;
  label: 0 | 1;
}

export interface SegmentationPrompt {
  points?: PointPrompt[];
  box?: Box;
  multimaskOutput?: boolean;
}

export interface SegmentationResult {
  masks: BinaryMask[];
  scores: number[];
}

export type Polygon = [number, number][];

export interface AnnotationMetadata {
  textPrompt: string;
  confidenceThreshold: number;
  numDetections: number;
}

export interface AnnotationResult {
  detections: DetectionResult;
  masks: BinaryMask[];
  metadata: AnnotationMetadata;
}

export interface RunOptions {
  confidenceThreshold?: number;
  useCache?: boolean;
}

export type RunStatus = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

export interface BatchItemOutcome {
  path: string;
  success: boolean;
  message: string;
}

export interface BatchSummary {
  outcomes: BatchItemOutcome[];
  processed: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
}

// Listener signatures for the notification channels
export type ProgressListener = (percentage: number, message: string) => void;
export type ErrorListener = (message: string) => void;
export type Unsubscribe = () => void;
