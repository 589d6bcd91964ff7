import type { Handedness, Landmark, TrackedHand } from "@hand-pointer/gesture-core";
import { z } from "zod";

export interface HandModel {
  estimateHands(video: HTMLVideoElement): Promise<TrackedHand[]>;
}

export interface TFJSHandModelOptions {
  modelType?: "lite" | "full";
  maxHands?: number;
  solutionPath?: string;
  flipHorizontal?: boolean;
  runtime?: Runtime;
}

type Runtime = "mediapipe" | "tfjs";
type HandPoseDetection = typeof import("@tensorflow-models/hand-pose-detection");
type HandDetector = Awaited<ReturnType<HandPoseDetection["createDetector"]>>;

const DEFAULT_SOLUTION_PATH = "https://cdn.jsdelivr.net/npm/@mediapipe/hands@0.4.1675469240";

const detectorPromises: Record<Runtime, Promise<HandDetector> | null> = {
  mediapipe: null,
  tfjs: null,
};
let tfBackendReady: Promise<void> | null = null;

async function loadDetector(runtime: Runtime, options: TFJSHandModelOptions): Promise<HandDetector> {
  const cached = detectorPromises[runtime];
  if (cached) return cached;
  const pending = (async () => {
    if (runtime === "tfjs") {
      await ensureTfjsBackend();
    }
    const handPoseDetection = await import("@tensorflow-models/hand-pose-detection");
    const { SupportedModels } = handPoseDetection;
    const maxHands = options.maxHands ?? 2;
    const modelType = options.modelType ?? "lite";
    if (runtime === "mediapipe") {
      return handPoseDetection.createDetector(SupportedModels.MediaPipeHands, {
        runtime: "mediapipe",
        modelType,
        maxHands,
        solutionPath: options.solutionPath ?? DEFAULT_SOLUTION_PATH,
      });
    }
    return handPoseDetection.createDetector(SupportedModels.MediaPipeHands, {
      runtime: "tfjs",
      modelType,
      maxHands,
    });
  })();
  detectorPromises[runtime] = pending;
  return pending;
}

class TFJSHandModel implements HandModel {
  private currentRuntime: Runtime;
  private readonly allowFallback: boolean;

  constructor(private readonly options: TFJSHandModelOptions = {}) {
    this.currentRuntime = options.runtime ?? "mediapipe";
    this.allowFallback = !options.runtime;
  }

  async estimateHands(video: HTMLVideoElement): Promise<TrackedHand[]> {
    if (!video.videoWidth || !video.videoHeight) {
      return [];
    }
    try {
      const detector = await loadDetector(this.currentRuntime, {
        modelType: this.options.modelType ?? (this.currentRuntime === "tfjs" ? "full" : "lite"),
        maxHands: this.options.maxHands,
        solutionPath: this.options.solutionPath,
      });
      const predictions = await detector.estimateHands(video, {
        flipHorizontal: this.options.flipHorizontal ?? false,
      });
      return mapDetectionsToTrackedHands(predictions, video);
    } catch (err) {
      // AbortError happens when play() is interrupted; skip frame.
      if (errorName(err) !== "AbortError") {
        console.error("handtracking-tfjs estimateHands failed", err);
        // Reset this runtime so next frame re-creates it; optionally fall back.
        detectorPromises[this.currentRuntime] = null;
        if (this.allowFallback && this.currentRuntime === "mediapipe") {
          this.currentRuntime = "tfjs";
        }
      }
      return [];
    }
  }
}

const KeypointSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number().optional(),
});

const HandednessSchema = z.union([
  z.enum(["Left", "Right"]),
  z.object({ label: z.enum(["Left", "Right"]) }).transform((h): Handedness => h.label),
]);

const DetectionSchema = z.object({
  handedness: z.unknown(),
  keypoints: z.array(KeypointSchema).optional(),
  keypoints3D: z.array(KeypointSchema).optional(),
});

/**
 * Converts raw detector output to tracked hands. Pixel keypoints are
 * normalized by the video size. A detection with unreadable keypoints is
 * skipped; one with an unreadable handedness label keeps its landmarks but
 * gets `handedness: null`, so role assignment leaves it out.
 */
export function mapDetectionsToTrackedHands(
  detections: readonly unknown[],
  video: { videoWidth: number; videoHeight: number }
): TrackedHand[] {
  const width = video.videoWidth || 1;
  const height = video.videoHeight || 1;

  const hands: TrackedHand[] = [];
  for (const detection of detections) {
    const parsed = DetectionSchema.safeParse(detection);
    if (!parsed.success) {
      console.warn("handtracking-tfjs skipped malformed detection", parsed.error.issues);
      continue;
    }
    const handedness = HandednessSchema.safeParse(parsed.data.handedness);
    const keypoints = parsed.data.keypoints ?? parsed.data.keypoints3D ?? [];
    const landmarks = keypoints.map((kp): Landmark => {
      const isNormalized = kp.x >= 0 && kp.x <= 1 && kp.y >= 0 && kp.y <= 1;
      const x = isNormalized ? kp.x : kp.x / width;
      const y = isNormalized ? kp.y : kp.y / height;
      return { x: clamp01(x), y: clamp01(y), z: kp.z };
    });
    hands.push({ handedness: handedness.success ? handedness.data : null, landmarks });
  }
  return hands;
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function errorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined;
}

async function ensureTfjsBackend(): Promise<void> {
  if (tfBackendReady) return tfBackendReady;
  tfBackendReady = (async () => {
    const tf = await import("@tensorflow/tfjs-core");
    await import("@tensorflow/tfjs-backend-webgl");
    try {
      if (tf.getBackend() !== "webgl") {
        await tf.setBackend("webgl");
      }
      await tf.ready();
    } catch (err) {
      console.warn("handtracking-tfjs WebGL backend unavailable, using cpu", err);
      await tf.setBackend("cpu");
      await tf.ready();
    }
  })();
  return tfBackendReady;
}

export async function createTFJSHandModel(options?: TFJSHandModelOptions): Promise<HandModel> {
  return new TFJSHandModel(options);
}

/** Model that never sees a hand, for environments without a camera or TFJS. */
export class StubHandModel implements HandModel {
  async estimateHands(_video: HTMLVideoElement): Promise<TrackedHand[]> {
    return [];
  }
}
