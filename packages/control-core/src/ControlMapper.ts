import { Gesture, HandLandmark, assertLandmarkSet, type LandmarkSet } from "@hand-pointer/gesture-core";
import { CursorDamper, defaultCursorDampingOptions } from "./cursorDamping";
import { PinchScrollSession, defaultPinchScrollOptions, type ScrollStep } from "./PinchScrollSession";
import { applyPointerCommand } from "./pointerCommands";
import type {
  ControlMapperOptions,
  ControlMapperState,
  CursorDampingOptions,
  PinchScrollOptions,
  PointerCommand,
  PointerDriver,
  ScreenPoint,
} from "./types";

type ResolvedControlMapperOptions = {
  damping: Required<CursorDampingOptions>;
  pinchScroll: Required<PinchScrollOptions>;
  scrollAmount: number;
};

const DEFAULT_CONFIG: ResolvedControlMapperOptions = {
  damping: defaultCursorDampingOptions,
  pinchScroll: defaultPinchScrollOptions,
  scrollAmount: 120,
};

function mergeConfig(config?: ControlMapperOptions): ResolvedControlMapperOptions {
  return {
    damping: { ...DEFAULT_CONFIG.damping, ...(config?.damping ?? {}) },
    pinchScroll: { ...DEFAULT_CONFIG.pinchScroll, ...(config?.pinchScroll ?? {}) },
    scrollAmount: config?.scrollAmount ?? DEFAULT_CONFIG.scrollAmount,
  };
}

/**
 * Turns the active hand's settled gesture into pointer actions. Owns every
 * piece of cross-frame control state: the armed flag set by V_GEST, the held
 * drag button, the pinch-scroll session and the cursor damping history.
 */
export class ControlMapper {
  private readonly config: ResolvedControlMapperOptions;
  private readonly damper: CursorDamper;
  private armed = false;
  private dragging = false;
  private pinch: PinchScrollSession | null = null;

  constructor(
    private readonly driver: PointerDriver,
    config?: ControlMapperOptions
  ) {
    this.config = mergeConfig(config);
    this.damper = new CursorDamper(this.config.damping);
  }

  /** Applies one frame and returns the commands sent to the driver, in order. */
  handle(gesture: Gesture, landmarks: LandmarkSet | null): PointerCommand[] {
    const commands: PointerCommand[] = [];
    const emit = (command: PointerCommand) => {
      commands.push(command);
      applyPointerCommand(this.driver, command);
    };

    const active = landmarks ? gesture : Gesture.PALM;
    // Tracked on every frame with a hand, so a gesture that moves the cursor
    // starts from where the hand is now and not from where it last moved.
    let target: ScreenPoint | null = null;
    if (landmarks) {
      assertLandmarkSet(landmarks);
      target = this.cursorTarget(landmarks);
    }

    if (active !== Gesture.FIST && this.dragging) {
      this.dragging = false;
      emit({ type: "BUTTON_UP", button: "left" });
    }
    if (active !== Gesture.PINCH_MINOR && this.pinch) {
      this.pinch = null;
    }

    switch (active) {
      case Gesture.V_GEST:
        this.armed = true;
        this.moveCursor(target, emit);
        break;
      case Gesture.FIST:
        if (!this.dragging) {
          this.dragging = true;
          emit({ type: "BUTTON_DOWN", button: "left" });
        }
        this.moveCursor(target, emit);
        break;
      case Gesture.MID:
        if (this.armed) {
          emit({ type: "CLICK", button: "left" });
          this.armed = false;
        }
        break;
      case Gesture.INDEX:
        if (this.armed) {
          emit({ type: "CLICK", button: "right" });
          this.armed = false;
        }
        break;
      case Gesture.TWO_FINGER_CLOSED:
        if (this.armed) {
          emit({ type: "DOUBLE_CLICK" });
          this.armed = false;
        }
        break;
      case Gesture.PINCH_MINOR:
        if (landmarks) {
          const tip = landmarks[HandLandmark.INDEX_TIP];
          if (!this.pinch) {
            this.pinch = new PinchScrollSession(tip, this.config.pinchScroll);
          }
          const step = this.pinch.update(tip);
          if (step) this.scroll(step, emit);
        }
        break;
      default:
        break;
    }

    return commands;
  }

  /** Forgets the last hand position, e.g. after frames with no hand in view. */
  resetTracking(): void {
    this.damper.reset();
  }

  getState(): ControlMapperState {
    return {
      armed: this.armed,
      dragging: this.dragging,
      lastHand: this.damper.getLastHand(),
      pinch: this.pinch ? this.pinch.getState() : null,
    };
  }

  private cursorTarget(landmarks: LandmarkSet): ScreenPoint {
    // Middle knuckle: steadier than any fingertip while fingers change pose.
    const anchor = landmarks[HandLandmark.MIDDLE_MCP];
    const { width, height } = this.driver.screenSize();
    const hand = { x: Math.trunc(anchor.x * width), y: Math.trunc(anchor.y * height) };
    return this.damper.next(hand, this.driver.cursorPosition());
  }

  private moveCursor(target: ScreenPoint | null, emit: (command: PointerCommand) => void): void {
    if (!target) return;
    const current = this.driver.cursorPosition();
    if (target.x === current.x && target.y === current.y) return;
    emit({ type: "MOVE", x: target.x, y: target.y });
  }

  private scroll(step: ScrollStep, emit: (command: PointerCommand) => void): void {
    const amount = this.config.scrollAmount;
    if (step.axis === "vertical") {
      emit({ type: "SCROLL", amount: step.level > 0 ? amount : -amount });
      return;
    }
    // Horizontal wheel emulated with shift+ctrl held around a vertical scroll.
    emit({ type: "KEY_DOWN", key: "shift" });
    emit({ type: "KEY_DOWN", key: "ctrl" });
    emit({ type: "SCROLL", amount: step.level > 0 ? -amount : amount });
    emit({ type: "KEY_UP", key: "ctrl" });
    emit({ type: "KEY_UP", key: "shift" });
  }
}

export { DEFAULT_CONFIG as defaultControlMapperConfig };
