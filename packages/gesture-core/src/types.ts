export type Handedness = "Left" | "Right";

export type HandRole = "MAJOR" | "MINOR";

export interface Landmark {
  x: number;
  y: number;
  z?: number;
}

/** 21 anatomical points in detector order, x/y normalized to the frame. */
export type LandmarkSet = readonly Landmark[];

export interface TrackedHand {
  /** `null` when the detector's label was missing or could not be read. */
  handedness: Handedness | null;
  landmarks: Landmark[];
}

export interface HandFrame {
  hands: TrackedHand[];
  timestamp: number;
}

export const LANDMARK_COUNT = 21;

export const HandLandmark = {
  WRIST: 0,
  THUMB_TIP: 4,
  INDEX_MCP: 5,
  INDEX_TIP: 8,
  MIDDLE_MCP: 9,
  MIDDLE_TIP: 12,
  RING_MCP: 13,
  RING_TIP: 16,
  PINKY_MCP: 17,
  PINKY_TIP: 20,
} as const;

export enum Gesture {
  FIST = 0,
  PINKY = 1,
  RING = 2,
  MID = 4,
  LAST3 = 7,
  INDEX = 8,
  FIRST2 = 12,
  LAST4 = 15,
  THUMB = 16,
  PALM = 31,
  V_GEST = 33,
  TWO_FINGER_CLOSED = 34,
  PINCH_MAJOR = 35,
  PINCH_MINOR = 36,
}

export interface HandClassifierOptions {
  /** Thumb-tip to index-tip distance below which LAST3/LAST4 counts as a pinch. */
  pinchThreshold?: number;
  /** Consecutive identical raw gestures required before the settled gesture changes. */
  debounceFrames?: number;
  extendedRatio?: number;
  spreadRatio?: number;
  closedDepthThreshold?: number;
}

export interface HandClassifierDebugState {
  role: HandRole;
  present: boolean;
  fingerState: number;
  candidate: Gesture;
  runLength: number;
  settled: Gesture;
}
