import { LANDMARK_COUNT, type LandmarkSet } from "./types";

export class InvalidLandmarkSetError extends Error {
  readonly expected = LANDMARK_COUNT;

  constructor(
    readonly received: number,
    detail?: string
  ) {
    super(
      detail
        ? `Invalid landmark set: ${detail}`
        : `Invalid landmark set: expected ${LANDMARK_COUNT} landmarks, received ${received}`
    );
    this.name = "InvalidLandmarkSetError";
  }
}

export function assertLandmarkSet(landmarks: LandmarkSet): void {
  if (landmarks.length < LANDMARK_COUNT) {
    throw new InvalidLandmarkSetError(landmarks.length);
  }
  landmarks.forEach((lm, index) => {
    if (!Number.isFinite(lm.x) || !Number.isFinite(lm.y)) {
      throw new InvalidLandmarkSetError(landmarks.length, `landmark ${index} has a non-finite coordinate`);
    }
  });
}
