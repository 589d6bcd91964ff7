import {
  Gesture,
  HandClassifier,
  assignHandRoles,
  type HandClassifierDebugState,
  type HandFrame,
  type HandRole,
} from "@hand-pointer/gesture-core";
import {
  resolveHandPointerConfig,
  toClassifierOptions,
  toControlMapperOptions,
  type HandPointerConfig,
  type HandPointerConfigInput,
} from "./config";
import { ControlMapper } from "./ControlMapper";
import type { ControlMapperState, PointerCommand, PointerDriver } from "./types";

export interface GesturePipelineDebugState {
  major: HandClassifierDebugState;
  minor: HandClassifierDebugState;
  /** Role whose gesture drove the mapper on the last frame; `null` when no hand was in view. */
  activeRole: HandRole | null;
  activeGesture: Gesture;
  mapper: ControlMapperState;
}

/**
 * One frame at a time: role assignment, both classifiers, then the mapper.
 * The off hand takes over only while it pinches, so it can scroll while the
 * dominant hand keeps its own gesture.
 */
export class GesturePipeline {
  readonly config: HandPointerConfig;
  private readonly major: HandClassifier;
  private readonly minor: HandClassifier;
  private readonly mapper: ControlMapper;
  private activeRole: HandRole | null = null;
  private activeGesture: Gesture = Gesture.PALM;

  constructor(driver: PointerDriver, config?: HandPointerConfigInput) {
    this.config = resolveHandPointerConfig(config ?? {});
    const classifierOptions = toClassifierOptions(this.config);
    this.major = new HandClassifier("MAJOR", classifierOptions);
    this.minor = new HandClassifier("MINOR", classifierOptions);
    this.mapper = new ControlMapper(driver, toControlMapperOptions(this.config));
  }

  process(frame: HandFrame): PointerCommand[] {
    if (frame.hands.length === 0) {
      this.major.update(null);
      this.minor.update(null);
      this.mapper.resetTracking();
      this.activeRole = null;
      this.activeGesture = Gesture.PALM;
      return this.mapper.handle(Gesture.PALM, null);
    }

    const roles = assignHandRoles(frame.hands, this.config.dominantHand);
    this.major.update(roles.major);
    this.minor.update(roles.minor);

    const minorGesture = this.minor.classify();
    if (minorGesture === Gesture.PINCH_MINOR) {
      this.activeRole = "MINOR";
      this.activeGesture = minorGesture;
      return this.mapper.handle(minorGesture, roles.minor);
    }
    this.activeRole = "MAJOR";
    this.activeGesture = this.major.classify();
    return this.mapper.handle(this.activeGesture, roles.major);
  }

  /**
   * Releases a held button and ends any pinch, then forgets both hands. Call
   * before dropping the pipeline so the driver is not left with input held.
   */
  dispose(): PointerCommand[] {
    this.major.reset();
    this.minor.reset();
    this.mapper.resetTracking();
    this.activeRole = null;
    this.activeGesture = Gesture.PALM;
    return this.mapper.handle(Gesture.PALM, null);
  }

  getGestures(): Record<HandRole, Gesture> {
    return { MAJOR: this.major.classify(), MINOR: this.minor.classify() };
  }

  getDebugState(): GesturePipelineDebugState {
    return {
      major: this.major.getDebugState(),
      minor: this.minor.getDebugState(),
      activeRole: this.activeRole,
      activeGesture: this.activeGesture,
      mapper: this.mapper.getState(),
    };
  }
}
