import type { CursorDampingOptions, ScreenPoint } from "./types";

const DEFAULT_DAMPING: Required<CursorDampingOptions> = {
  deadzoneSq: 25,
  linearLimitSq: 900,
  gain: 0.07,
  flickGain: 2.1,
};

/** Scale applied to a hand delta, picked from three tiers of its squared length. */
export function dampingScale(distSq: number, options: Required<CursorDampingOptions>): number {
  if (distSq <= options.deadzoneSq) return 0;
  if (distSq <= options.linearLimitSq) return options.gain * Math.sqrt(distSq);
  return options.flickGain;
}

/** Tracks the raw hand position between frames and turns its motion into a cursor target. */
export class CursorDamper {
  private readonly options: Required<CursorDampingOptions>;
  private lastHand: ScreenPoint | null = null;

  constructor(opts?: CursorDampingOptions) {
    this.options = { ...DEFAULT_DAMPING, ...(opts ?? {}) };
  }

  /** `hand` is the raw hand position and `cursor` the current pointer, both in pixels. */
  next(hand: ScreenPoint, cursor: ScreenPoint): ScreenPoint {
    const last = this.lastHand ?? hand;
    const dx = hand.x - last.x;
    const dy = hand.y - last.y;
    this.lastHand = { ...hand };

    const scale = dampingScale(dx * dx + dy * dy, this.options);
    return { x: cursor.x + dx * scale, y: cursor.y + dy * scale };
  }

  getLastHand(): ScreenPoint | null {
    return this.lastHand ? { ...this.lastHand } : null;
  }

  reset(): void {
    this.lastHand = null;
  }
}

export { DEFAULT_DAMPING as defaultCursorDampingOptions };
