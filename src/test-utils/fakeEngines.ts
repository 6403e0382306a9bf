import type { Detector, Segmenter } from '../pipeline/annotationOrchestrator';
import type {
  Box,
  DetectionResult,
  ModelHandle,
  ProgressListener,
  RgbImage,
  SegmentationPrompt,
  SegmentationResult,
  Unsubscribe,
} from '../types';
import { bboxToMask } from '../utils/mask';

class FakeEngineBase {
  loaded = false;
  private listeners = new Set<ProgressListener>();

  async load(): Promise<ModelHandle> {
    this.loaded = true;
    return { device: 'cpu', loadedState: 'loaded', modelRef: 'fake' };
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  onProgress(listener: ProgressListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  protected progress(percentage: number, message: string) {
    for (const listener of this.listeners) listener(percentage, message);
  }
}

/** Detector that always finds the same boxes. */
export class FakeDetector extends FakeEngineBase implements Detector {
  readonly name = 'Detector';
  calls: { textPrompt: string; confidenceThreshold: number | undefined }[] = [];
  /** Runs inside each detect call, before it resolves. */
  during: () => void | Promise<void> = () => undefined;

  constructor(private result: DetectionResult) {
    super();
  }

  async detect(_image: RgbImage, textPrompt: string, confidenceThreshold?: number): Promise<DetectionResult> {
    this.calls.push({ textPrompt, confidenceThreshold });
    this.progress(50, 'Running object detection...');
    await this.during();
    return this.result;
  }
}

/** Segmenter whose mask is the filled prompt box. */
export class FakeSegmenter extends FakeEngineBase implements Segmenter {
  readonly name = 'Segmenter';
  boxes: Box[] = [];
  /** Runs inside each predict call with the 1-based call number. */
  during: (call: number) => void = () => undefined;

  async predict(image: RgbImage, prompt: SegmentationPrompt): Promise<SegmentationResult> {
    if (!prompt.box) throw new Error('box prompt expected');
    this.boxes.push(prompt.box);
    this.during(this.boxes.length);
    return { masks: bboxToMask([prompt.box], image.height, image.width), scores: [0.95] };
  }
}

export function twoObjects(): DetectionResult {
  return {
    boxes: [
      [1, 1, 4, 4],
      [5, 2, 8, 6],
    ],
    labels: ['cat', 'dog'],
    scores: [0.9, 0.8],
  };
}
