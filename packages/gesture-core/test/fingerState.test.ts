import { describe, expect, it } from "vitest";
import {
  Gesture,
  computeFingerState,
  gestureFromFingerState,
  guardedRatio,
  isNamedFingerState,
  signedDistance2D,
} from "../src";
import type { Landmark } from "../src";
import { buildHand } from "./handFixtures";

describe("signedDistance2D", () => {
  it("is positive when the first point is above the second", () => {
    expect(signedDistance2D({ x: 0, y: 0.2 }, { x: 0, y: 0.5 })).toBeCloseTo(0.3);
    expect(signedDistance2D({ x: 0, y: 0.5 }, { x: 0, y: 0.2 })).toBeCloseTo(-0.3);
  });
});

describe("guardedRatio", () => {
  it("divides normally", () => {
    expect(guardedRatio(1, 4)).toBe(0.25);
  });

  it("falls back to a finite ratio for a collapsed denominator", () => {
    expect(guardedRatio(0.3, 0)).toBeCloseTo(30);
    expect(Number.isFinite(guardedRatio(0.3, -0))).toBe(true);
  });
});

describe("computeFingerState", () => {
  it("sets one bit per extended finger with the thumb always clear", () => {
    const state = computeFingerState(buildHand({ extended: ["index", "ring"] }));
    expect(state).toBe(0b01010);
  });

  it("survives knuckles collapsed onto the wrist", () => {
    const landmarks: Landmark[] = Array.from({ length: 21 }, () => ({ x: 0.5, y: 0.9 }));
    for (const tip of [8, 12, 16, 20]) {
      landmarks[tip] = { x: 0.5, y: 0.6 };
    }
    expect(computeFingerState(landmarks)).toBe(15);
  });
});

describe("gestureFromFingerState", () => {
  it("returns named patterns as themselves", () => {
    expect(gestureFromFingerState(0)).toBe(Gesture.FIST);
    expect(gestureFromFingerState(12)).toBe(Gesture.FIRST2);
    expect(gestureFromFingerState(31)).toBe(Gesture.PALM);
  });

  it("reads unnamed patterns as PALM", () => {
    expect(gestureFromFingerState(0b01001)).toBe(Gesture.PALM);
  });

  it("tells named patterns from unnamed ones", () => {
    expect(isNamedFingerState(15)).toBe(true);
    expect(isNamedFingerState(31)).toBe(true);
    expect(isNamedFingerState(14)).toBe(false);
    expect(isNamedFingerState(9)).toBe(false);
  });
});
