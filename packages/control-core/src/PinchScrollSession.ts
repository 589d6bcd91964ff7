import { roundTo1 } from "@hand-pointer/gesture-core";
import type { FramePoint, PinchScrollOptions, PinchScrollState, ScrollAxis } from "./types";

const DEFAULT_PINCH_SCROLL: Required<PinchScrollOptions> = {
  threshold: 0.3,
  stableFrames: 5,
};

export interface ScrollStep {
  axis: ScrollAxis;
  level: number;
}

/**
 * Quantized displacement of the index fingertip from where a pinch began.
 * A level has to hold for `stableFrames` frames before it produces a scroll
 * step; tremor below `threshold` never moves the level.
 *
 * The frame that records a new level counts as its first stable frame, so a
 * held level commits on its `stableFrames`-th frame, not one frame later as it
 * would if the counter restarted at 0. After a commit the counter does restart
 * at 0, and repeats come every `stableFrames` frames.
 */
export class PinchScrollSession {
  private readonly options: Required<PinchScrollOptions>;
  private readonly origin: FramePoint;
  private axis: ScrollAxis | null = null;
  private level = 0;
  private committedLevel = 0;
  private stableCount = 0;

  constructor(origin: FramePoint, opts?: PinchScrollOptions) {
    this.options = { ...DEFAULT_PINCH_SCROLL, ...(opts ?? {}) };
    this.origin = { x: origin.x, y: origin.y };
  }

  /** Feeds the current fingertip; returns a step when one commits. */
  update(tip: FramePoint): ScrollStep | null {
    const { threshold } = this.options;
    const lvx = roundTo1((tip.x - this.origin.x) * 10);
    // Screen y grows downward; moving the hand up reads positive.
    const lvy = roundTo1((this.origin.y - tip.y) * 10);

    let axis: ScrollAxis;
    let value: number;
    if (Math.abs(lvy) > Math.abs(lvx) && Math.abs(lvy) > threshold) {
      axis = "vertical";
      value = lvy;
    } else if (Math.abs(lvx) > threshold) {
      axis = "horizontal";
      value = lvx;
    } else {
      return null;
    }
    this.axis = axis;

    if (Math.abs(this.level - value) < threshold) {
      this.stableCount += 1;
    } else {
      this.level = value;
      this.stableCount = 1;
    }

    if (this.stableCount < this.options.stableFrames) return null;
    this.stableCount = 0;
    this.committedLevel = this.level;
    return { axis, level: this.committedLevel };
  }

  getState(): PinchScrollState {
    return {
      origin: { ...this.origin },
      axis: this.axis,
      level: this.level,
      committedLevel: this.committedLevel,
      stableCount: this.stableCount,
    };
  }
}

export { DEFAULT_PINCH_SCROLL as defaultPinchScrollOptions };
