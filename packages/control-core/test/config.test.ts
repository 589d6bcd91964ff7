import { describe, expect, it } from "vitest";
import {
  HandPointerConfigError,
  resolveHandPointerConfig,
  toClassifierOptions,
  toControlMapperOptions,
} from "../src";

describe("resolveHandPointerConfig", () => {
  it("fills every option with its default", () => {
    expect(resolveHandPointerConfig()).toEqual({
      dominantHand: "Right",
      pinchDistanceThreshold: 0.05,
      pinchScrollThreshold: 0.3,
      debounceFrames: 5,
      scrollStableFrames: 5,
      dampingDeadzoneSq: 25,
      dampingLinearLimitSq: 900,
      dampingGain: 0.07,
      flickGain: 2.1,
      extendedRatio: 0.5,
      spreadRatio: 1.7,
      closedDepthThreshold: 0.1,
      scrollAmount: 120,
    });
  });

  it("keeps overrides", () => {
    const config = resolveHandPointerConfig({ dominantHand: "Left", pinchScrollThreshold: 0.2 });
    expect(config.dominantHand).toBe("Left");
    expect(toControlMapperOptions(config).pinchScroll).toEqual({ threshold: 0.2, stableFrames: 5 });
    expect(toClassifierOptions(config).pinchThreshold).toBe(0.05);
  });

  it("rejects unknown keys and invalid values", () => {
    expect(() => resolveHandPointerConfig({ pinchTreshold: 0.1 })).toThrow(HandPointerConfigError);
    expect(() => resolveHandPointerConfig({ debounceFrames: 0 })).toThrow(/debounceFrames/);
    expect(() => resolveHandPointerConfig({ dominantHand: "Both" })).toThrow(/dominantHand/);
  });

  it("rejects a linear limit below the deadzone", () => {
    expect(() => resolveHandPointerConfig({ dampingDeadzoneSq: 50, dampingLinearLimitSq: 40 })).toThrow(
      /dampingLinearLimitSq: dampingLinearLimitSq must not be below dampingDeadzoneSq/
    );
  });
});
