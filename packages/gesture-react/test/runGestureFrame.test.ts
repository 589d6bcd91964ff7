import { describe, expect, it } from "vitest";
import { GesturePipeline, RecordingPointerDriver } from "@hand-pointer/control-core";
import { Gesture, type Landmark, type TrackedHand } from "@hand-pointer/gesture-core";
import type { HandModel } from "@hand-pointer/handtracking-tfjs";
import { gestureLabel, runGestureFrame } from "../src";

function fistLandmarks(): Landmark[] {
  const landmarks: Landmark[] = Array.from({ length: 21 }, () => ({ x: 0.5, y: 0.9, z: 0 }));
  [5, 9, 13, 17].forEach((base, i) => {
    const x = 0.4 + i * 0.07;
    landmarks[base] = { x, y: 0.6, z: 0 };
    landmarks[base + 3] = { x, y: 0.65, z: 0 };
  });
  landmarks[4] = { x: 0.2, y: 0.7, z: 0 };
  return landmarks;
}

class ScriptedHandModel implements HandModel {
  calls = 0;

  constructor(private readonly hands: TrackedHand[]) {}

  async estimateHands(_video: HTMLVideoElement): Promise<TrackedHand[]> {
    this.calls += 1;
    return this.hands;
  }
}

const video = {} as HTMLVideoElement;

describe("runGestureFrame", () => {
  it("feeds estimated hands through the pipeline", async () => {
    const driver = new RecordingPointerDriver({ width: 800, height: 600 });
    const pipeline = new GesturePipeline(driver);
    const model = new ScriptedHandModel([{ handedness: "Right", landmarks: fistLandmarks() }]);

    const frames = [];
    for (let i = 0; i < 5; i++) {
      frames.push(await runGestureFrame({ model, video, pipeline, timestamp: i * 40 }));
    }

    expect(model.calls).toBe(5);
    expect(frames[3].commands).toEqual([]);
    expect(frames[4].commands).toEqual([{ type: "BUTTON_DOWN", button: "left" }]);
    expect(frames[4].gestures).toEqual({ MAJOR: Gesture.FIST, MINOR: Gesture.PALM });
    expect(frames[4].handCount).toBe(1);
    expect(driver.pressed.has("left")).toBe(true);
  });

  it("includes hands and timings only in debug mode", async () => {
    const pipeline = new GesturePipeline(new RecordingPointerDriver());
    const model = new ScriptedHandModel([]);

    const quiet = await runGestureFrame({ model, video, pipeline, timestamp: 0 });
    expect(quiet.hands).toBeUndefined();
    expect(quiet.timings).toBeUndefined();
    expect(quiet.fps).toBeUndefined();

    const verbose = await runGestureFrame({ model, video, pipeline, timestamp: 50, sinceLast: 50, debug: true });
    expect(verbose.hands).toEqual([]);
    expect(verbose.fps).toBe(20);
    expect(verbose.timings?.totalMs).toBeGreaterThanOrEqual(0);
    expect(verbose.debugState.activeRole).toBeNull();
  });
});

describe("gestureLabel", () => {
  it("names gestures", () => {
    expect(gestureLabel(Gesture.V_GEST)).toBe("V_GEST");
    expect(gestureLabel(Gesture.PALM)).toBe("PALM");
  });
});
