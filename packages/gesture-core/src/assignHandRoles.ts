import type { Handedness, LandmarkSet, TrackedHand } from "./types";

export interface RoleAssignment {
  major: LandmarkSet | null;
  minor: LandmarkSet | null;
}

/**
 * Splits detected hands into the dominant (major) and off (minor) hand by
 * handedness label. Unlabeled hands are left out rather than guessed; when two
 * hands share a label the later detection wins.
 */
export function assignHandRoles(
  hands: readonly TrackedHand[],
  dominantHand: Handedness = "Right"
): RoleAssignment {
  const byLabel = new Map<Handedness, LandmarkSet>();
  for (const hand of hands) {
    if (hand.handedness === null) continue;
    byLabel.set(hand.handedness, hand.landmarks);
  }
  const offHand: Handedness = dominantHand === "Right" ? "Left" : "Right";
  return {
    major: byLabel.get(dominantHand) ?? null,
    minor: byLabel.get(offHand) ?? null,
  };
}
