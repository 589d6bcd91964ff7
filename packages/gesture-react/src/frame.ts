import type { GesturePipeline, GesturePipelineDebugState, PointerCommand } from "@hand-pointer/control-core";
import type { Gesture, HandFrame, HandRole } from "@hand-pointer/gesture-core";
import type { HandModel } from "@hand-pointer/handtracking-tfjs";

export type GestureDebugFrame = {
  timestamp: number;
  fps?: number;
  handCount: number;
  hands?: HandFrame["hands"];
  gestures: Record<HandRole, Gesture>;
  debugState: GesturePipelineDebugState;
  commands: PointerCommand[];
  timings?: { estimateMs: number; updateMs: number; totalMs: number };
};

export type GestureFrameInput = {
  model: HandModel;
  video: HTMLVideoElement;
  pipeline: GesturePipeline;
  timestamp: number;
  /** Milliseconds since the previous frame, when known. */
  sinceLast?: number;
  debug?: boolean;
};

/** One estimate → classify → map step of the frame loop. */
export async function runGestureFrame({
  model,
  video,
  pipeline,
  timestamp,
  sinceLast,
  debug,
}: GestureFrameInput): Promise<GestureDebugFrame> {
  const estimateStart = performance.now();
  const hands = await model.estimateHands(video);
  const estimateMs = performance.now() - estimateStart;

  const updateStart = performance.now();
  const commands = pipeline.process({ hands, timestamp });
  const updateMs = performance.now() - updateStart;

  return {
    timestamp,
    fps: sinceLast ? 1000 / sinceLast : undefined,
    handCount: hands.length,
    hands: debug ? hands : undefined,
    gestures: pipeline.getGestures(),
    debugState: pipeline.getDebugState(),
    commands,
    timings: debug ? { estimateMs, updateMs, totalMs: estimateMs + updateMs } : undefined,
  };
}
