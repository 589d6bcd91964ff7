import type {
  ModifierKey,
  MouseButton,
  PointerCommand,
  PointerDriver,
  ScreenPoint,
  ScreenSize,
} from "./types";

export interface RecordingPointerDriverOptions {
  width?: number;
  height?: number;
  /** Initial cursor position; defaults to the screen centre. */
  cursor?: ScreenPoint;
}

/**
 * In-memory pointer driver. Keeps the cursor inside the screen like an OS
 * would and records every call as a `PointerCommand`.
 */
export class RecordingPointerDriver implements PointerDriver {
  readonly log: PointerCommand[] = [];
  readonly pressed = new Set<MouseButton>();
  readonly heldKeys = new Set<ModifierKey>();
  private readonly size: ScreenSize;
  private cursor: ScreenPoint;

  constructor(options: RecordingPointerDriverOptions = {}) {
    this.size = { width: options.width ?? 1920, height: options.height ?? 1080 };
    this.cursor = options.cursor ?? { x: this.size.width / 2, y: this.size.height / 2 };
  }

  screenSize(): ScreenSize {
    return { ...this.size };
  }

  cursorPosition(): ScreenPoint {
    return { ...this.cursor };
  }

  moveTo(x: number, y: number): void {
    this.cursor = {
      x: clamp(x, 0, this.size.width - 1),
      y: clamp(y, 0, this.size.height - 1),
    };
    this.log.push({ type: "MOVE", x, y });
  }

  mouseDown(button: MouseButton): void {
    this.pressed.add(button);
    this.log.push({ type: "BUTTON_DOWN", button });
  }

  mouseUp(button: MouseButton): void {
    this.pressed.delete(button);
    this.log.push({ type: "BUTTON_UP", button });
  }

  click(button: MouseButton): void {
    this.log.push({ type: "CLICK", button });
  }

  doubleClick(): void {
    this.log.push({ type: "DOUBLE_CLICK" });
  }

  scroll(amount: number): void {
    this.log.push({ type: "SCROLL", amount });
  }

  keyDown(key: ModifierKey): void {
    this.heldKeys.add(key);
    this.log.push({ type: "KEY_DOWN", key });
  }

  keyUp(key: ModifierKey): void {
    this.heldKeys.delete(key);
    this.log.push({ type: "KEY_UP", key });
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
