import { assertLandmarkSet } from "./errors";
import {
  computeFingerState,
  depthDifference,
  distance2D,
  gestureFromFingerState,
  guardedRatio,
  isNamedFingerState,
  type FingerState,
} from "./fingerState";
import {
  Gesture,
  HandLandmark,
  type HandClassifierDebugState,
  type HandClassifierOptions,
  type HandRole,
  type LandmarkSet,
} from "./types";

const DEFAULTS: Required<HandClassifierOptions> = {
  pinchThreshold: 0.05,
  debounceFrames: 5,
  extendedRatio: 0.5,
  spreadRatio: 1.7,
  closedDepthThreshold: 0.1,
};

/**
 * Per-hand gesture recognizer. Each `update` reads one frame of landmarks,
 * derives a raw gesture and feeds it through a run-length debounce; `classify`
 * reports the settled gesture only.
 */
export class HandClassifier {
  private readonly options: Required<HandClassifierOptions>;
  private landmarks: LandmarkSet | null = null;
  private fingerState: FingerState = 0;
  private candidate: Gesture = Gesture.PALM;
  // Unnamed patterns all read as PALM; each one still runs its own debounce.
  private candidatePattern: FingerState | null = null;
  private runLength = 0;
  private settled: Gesture = Gesture.PALM;

  constructor(
    readonly role: HandRole,
    opts?: HandClassifierOptions
  ) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  update(landmarks: LandmarkSet | null): void {
    if (!landmarks) {
      // Absent hand: leave the debounce untouched so a dropped frame cannot settle anything.
      this.landmarks = null;
      return;
    }
    assertLandmarkSet(landmarks);
    this.landmarks = landmarks;
    this.fingerState = computeFingerState(landmarks, this.options.extendedRatio);

    const raw = this.rawGesture(landmarks, this.fingerState);
    const pattern = isNamedFingerState(this.fingerState) ? null : this.fingerState;
    if (raw === this.candidate && pattern === this.candidatePattern) {
      this.runLength += 1;
    } else {
      this.candidate = raw;
      this.candidatePattern = pattern;
      this.runLength = 1;
    }
    if (this.runLength >= this.options.debounceFrames) {
      this.settled = raw;
    }
  }

  classify(): Gesture {
    if (!this.landmarks) return Gesture.PALM;
    return this.settled;
  }

  getDebugState(): HandClassifierDebugState {
    return {
      role: this.role,
      present: this.landmarks !== null,
      fingerState: this.fingerState,
      candidate: this.candidate,
      runLength: this.runLength,
      settled: this.settled,
    };
  }

  reset(): void {
    this.landmarks = null;
    this.fingerState = 0;
    this.candidate = Gesture.PALM;
    this.candidatePattern = null;
    this.runLength = 0;
    this.settled = Gesture.PALM;
  }

  private rawGesture(landmarks: LandmarkSet, state: FingerState): Gesture {
    const pattern = gestureFromFingerState(state);

    if (
      (pattern === Gesture.LAST3 || pattern === Gesture.LAST4) &&
      distance2D(landmarks[HandLandmark.INDEX_TIP], landmarks[HandLandmark.THUMB_TIP]) <
        this.options.pinchThreshold
    ) {
      return this.role === "MINOR" ? Gesture.PINCH_MINOR : Gesture.PINCH_MAJOR;
    }

    if (pattern === Gesture.FIRST2) {
      const spread = guardedRatio(
        distance2D(landmarks[HandLandmark.INDEX_TIP], landmarks[HandLandmark.MIDDLE_TIP]),
        distance2D(landmarks[HandLandmark.INDEX_MCP], landmarks[HandLandmark.MIDDLE_MCP])
      );
      if (spread > this.options.spreadRatio) return Gesture.V_GEST;
      if (
        depthDifference(landmarks[HandLandmark.INDEX_TIP], landmarks[HandLandmark.MIDDLE_TIP]) <
        this.options.closedDepthThreshold
      ) {
        return Gesture.TWO_FINGER_CLOSED;
      }
      return Gesture.MID;
    }

    return pattern;
  }
}

export { DEFAULTS as defaultHandClassifierOptions };
