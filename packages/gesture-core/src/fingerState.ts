import { Gesture, HandLandmark, type Landmark, type LandmarkSet } from "./types";

/** Bit per finger, thumb highest: 1 = extended. */
export type FingerState = number;

// [tip, base knuckle] for the four fingers read by the ratio test, in bit order.
const FINGER_CHAINS: ReadonlyArray<readonly [number, number]> = [
  [HandLandmark.INDEX_TIP, HandLandmark.INDEX_MCP],
  [HandLandmark.MIDDLE_TIP, HandLandmark.MIDDLE_MCP],
  [HandLandmark.RING_TIP, HandLandmark.RING_MCP],
  [HandLandmark.PINKY_TIP, HandLandmark.PINKY_MCP],
];

const DEGENERATE_DISTANCE = 1e-6;
const FALLBACK_DIVISOR = 0.01;

const NAMED_PATTERNS: ReadonlySet<Gesture> = new Set([
  Gesture.FIST,
  Gesture.PINKY,
  Gesture.RING,
  Gesture.MID,
  Gesture.LAST3,
  Gesture.INDEX,
  Gesture.FIRST2,
  Gesture.LAST4,
  Gesture.THUMB,
  Gesture.PALM,
]);

export function distance2D(a: Landmark, b: Landmark): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/** Distance from `a` to `b`, negative unless `a` sits above `b` in the frame. */
export function signedDistance2D(a: Landmark, b: Landmark): number {
  const sign = a.y < b.y ? 1 : -1;
  return distance2D(a, b) * sign;
}

export function depthDifference(a: Landmark, b: Landmark): number {
  return Math.abs((a.z ?? 0) - (b.z ?? 0));
}

/** Divides without faulting when the reference length collapses to zero. */
export function guardedRatio(numerator: number, denominator: number): number {
  if (Math.abs(denominator) < DEGENERATE_DISTANCE) {
    return numerator / FALLBACK_DIVISOR;
  }
  return numerator / denominator;
}

export function roundTo1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function computeFingerState(landmarks: LandmarkSet, extendedRatio = 0.5): FingerState {
  const wrist = landmarks[HandLandmark.WRIST];
  // Thumb is not read by the ratio test and always contributes 0.
  let state = 0;
  for (const [tipIndex, baseIndex] of FINGER_CHAINS) {
    const tip = landmarks[tipIndex];
    const base = landmarks[baseIndex];
    const ratio = roundTo1(guardedRatio(signedDistance2D(tip, base), signedDistance2D(base, wrist)));
    state = (state << 1) | (ratio > extendedRatio ? 1 : 0);
  }
  return state;
}

export function isNamedFingerState(state: FingerState): boolean {
  return gestureFromFingerState(state) === state;
}

/** Named gesture for a bare bit pattern; patterns without a name read as an open hand. */
export function gestureFromFingerState(state: FingerState): Gesture {
  for (const gesture of NAMED_PATTERNS) {
    if (gesture === state) return gesture;
  }
  return Gesture.PALM;
}
