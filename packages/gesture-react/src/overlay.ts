import { Gesture, type HandFrame, type HandRole } from "@hand-pointer/gesture-core";

// MediaPipe hand skeleton as landmark index pairs.
export const HAND_EDGES: ReadonlyArray<readonly [number, number]> = [
  [0, 1], [1, 2], [2, 3], [3, 4],
  [0, 5], [5, 6], [6, 7], [7, 8],
  [0, 9], [9, 10], [10, 11], [11, 12],
  [0, 13], [13, 14], [14, 15], [15, 16],
  [0, 17], [17, 18], [18, 19], [19, 20],
  [5, 9], [9, 13], [13, 17],
];

export function gestureLabel(gesture: Gesture): string {
  return Gesture[gesture] ?? "UNKNOWN";
}

export function drawOverlay({
  canvas,
  hands,
  gestures,
}: {
  canvas: HTMLCanvasElement | null;
  hands?: HandFrame["hands"];
  gestures?: Record<HandRole, Gesture>;
}) {
  if (!canvas) return;
  const ctx = canvas.getContext("2d");
  if (!ctx) return;

  if (canvas.width !== canvas.clientWidth || canvas.height !== canvas.clientHeight) {
    canvas.width = canvas.clientWidth;
    canvas.height = canvas.clientHeight;
  }
  ctx.clearRect(0, 0, canvas.width, canvas.height);

  if (hands && hands.length) {
    hands.forEach((hand) => {
      const color = hand.handedness === "Left" ? "#7c5dff" : hand.handedness === "Right" ? "#46e6a5" : "#888888";
      ctx.fillStyle = color;
      ctx.strokeStyle = color;
      ctx.lineWidth = 2;

      ctx.beginPath();
      for (const [from, to] of HAND_EDGES) {
        const a = hand.landmarks[from];
        const b = hand.landmarks[to];
        if (!a || !b) continue;
        ctx.moveTo(a.x * canvas.width, a.y * canvas.height);
        ctx.lineTo(b.x * canvas.width, b.y * canvas.height);
      }
      ctx.stroke();

      hand.landmarks.forEach((lm) => {
        ctx.beginPath();
        ctx.arc(lm.x * canvas.width, lm.y * canvas.height, 3, 0, Math.PI * 2);
        ctx.fill();
      });
    });
  }

  if (gestures) {
    ctx.fillStyle = "#ffffff";
    ctx.font = "12px sans-serif";
    ctx.fillText(`major: ${gestureLabel(gestures.MAJOR)}`, 10, 20);
    ctx.fillText(`minor: ${gestureLabel(gestures.MINOR)}`, 10, 36);
  }
}
