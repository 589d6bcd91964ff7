export type MouseButton = "left" | "right";

export type ModifierKey = "shift" | "ctrl";

export interface ScreenPoint {
  x: number;
  y: number;
}

/** A point in normalized frame coordinates. */
export interface FramePoint {
  x: number;
  y: number;
}

export interface ScreenSize {
  width: number;
  height: number;
}

/** OS input injection boundary. Coordinates are absolute screen pixels. */
export interface PointerDriver {
  screenSize(): ScreenSize;
  cursorPosition(): ScreenPoint;
  moveTo(x: number, y: number): void;
  mouseDown(button: MouseButton): void;
  mouseUp(button: MouseButton): void;
  click(button: MouseButton): void;
  doubleClick(): void;
  scroll(amount: number): void;
  keyDown(key: ModifierKey): void;
  keyUp(key: ModifierKey): void;
}

export type PointerCommand =
  | { type: "MOVE"; x: number; y: number }
  | { type: "BUTTON_DOWN"; button: MouseButton }
  | { type: "BUTTON_UP"; button: MouseButton }
  | { type: "CLICK"; button: MouseButton }
  | { type: "DOUBLE_CLICK" }
  | { type: "SCROLL"; amount: number }
  | { type: "KEY_DOWN"; key: ModifierKey }
  | { type: "KEY_UP"; key: ModifierKey };

export type ScrollAxis = "horizontal" | "vertical";

export interface CursorDampingOptions {
  /** Squared pixel deltas at or below this are treated as jitter. */
  deadzoneSq?: number;
  /** Upper bound of the progressive tier, in squared pixels. */
  linearLimitSq?: number;
  /** Progressive tier scale is `gain * sqrt(d²)`. */
  gain?: number;
  /** Fixed scale for fast motion above `linearLimitSq`. */
  flickGain?: number;
}

export interface PinchScrollOptions {
  threshold?: number;
  stableFrames?: number;
}

export interface ControlMapperOptions {
  damping?: CursorDampingOptions;
  pinchScroll?: PinchScrollOptions;
  /** Wheel units per committed scroll step. */
  scrollAmount?: number;
}

export interface PinchScrollState {
  origin: FramePoint;
  axis: ScrollAxis | null;
  level: number;
  committedLevel: number;
  stableCount: number;
}

export interface ControlMapperState {
  armed: boolean;
  dragging: boolean;
  lastHand: ScreenPoint | null;
  pinch: PinchScrollState | null;
}
