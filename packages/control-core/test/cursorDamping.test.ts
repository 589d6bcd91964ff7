import { describe, expect, it } from "vitest";
import { CursorDamper, dampingScale, defaultCursorDampingOptions } from "../src";

describe("dampingScale", () => {
  it("follows the three tiers", () => {
    expect(dampingScale(0, defaultCursorDampingOptions)).toBe(0);
    expect(dampingScale(25, defaultCursorDampingOptions)).toBe(0);
    expect(dampingScale(36, defaultCursorDampingOptions)).toBeCloseTo(0.42);
    expect(dampingScale(900, defaultCursorDampingOptions)).toBeCloseTo(2.1);
    expect(dampingScale(901, defaultCursorDampingOptions)).toBe(2.1);
  });
});

describe("CursorDamper", () => {
  it("offsets the cursor by the damped hand delta", () => {
    const damper = new CursorDamper();
    const cursor = { x: 100, y: 100 };
    expect(damper.next({ x: 10, y: 10 }, cursor)).toEqual(cursor);
    const target = damper.next({ x: 10, y: 18 }, cursor);
    expect(target.x).toBe(100);
    expect(target.y).toBeCloseTo(100 + 8 * 0.56);
  });

  it("accepts custom breakpoints", () => {
    const damper = new CursorDamper({ deadzoneSq: 0, linearLimitSq: 0, flickGain: 1 });
    damper.next({ x: 0, y: 0 }, { x: 0, y: 0 });
    expect(damper.next({ x: 3, y: 4 }, { x: 0, y: 0 })).toEqual({ x: 3, y: 4 });
  });
});
