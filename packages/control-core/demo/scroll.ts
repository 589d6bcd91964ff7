import { Gesture, type Landmark } from "@hand-pointer/gesture-core";
import { ControlMapper, RecordingPointerDriver } from "../src";

const driver = new RecordingPointerDriver({ width: 1280, height: 720 });
const mapper = new ControlMapper(driver);

function handAt(tipX: number, tipY: number): Landmark[] {
  const landmarks: Landmark[] = Array.from({ length: 21 }, () => ({ x: 0.5, y: 0.5, z: 0 }));
  landmarks[8] = { x: tipX, y: tipY, z: 0 };
  return landmarks;
}

// Pinch, then drag the fingertip up and hold it there.
mapper.handle(Gesture.PINCH_MINOR, handAt(0.5, 0.5));
for (let frame = 0; frame < 6; frame++) {
  mapper.handle(Gesture.PINCH_MINOR, handAt(0.5, 0.44));
}
mapper.handle(Gesture.PALM, null);

console.log("Commands sent:", driver.log);
