import { useEffect, useRef } from "react";
import {
  GesturePipeline,
  type HandPointerConfigInput,
  type PointerCommand,
  type PointerDriver,
} from "@hand-pointer/control-core";
import type { HandModel } from "@hand-pointer/handtracking-tfjs";
import { runGestureFrame, type GestureDebugFrame } from "./frame";
import { drawOverlay } from "./overlay";

export type GestureError =
  | { type: "webcam-permission-denied" }
  | { type: "no-webcam" }
  | { type: "model-init-failed"; error: unknown }
  | { type: "frame-failed"; error: unknown };

export type UseGestureControlOptions = {
  model: HandModel | null;
  /** OS-input collaborator the pointer commands are sent to. */
  driver: PointerDriver;
  config?: HandPointerConfigInput;
  onCommand?: (cmd: PointerCommand) => void;
  fps?: number;
  debug?: boolean;
  onError?: (err: GestureError) => void;
  onDebugFrame?: (frame: GestureDebugFrame) => void;
};

export function useGestureControl(options: UseGestureControlOptions) {
  const { model, driver, config, fps, debug } = options;
  const videoRef = useRef<HTMLVideoElement>(null);
  const overlayRef = useRef<HTMLCanvasElement>(null);

  const onCommandRef = useRef(options.onCommand);
  useEffect(() => {
    onCommandRef.current = options.onCommand;
  }, [options.onCommand]);

  // Rebuild only when a config value changes; an inline object literal is a new identity every render.
  const configRef = useRef(config);
  configRef.current = config;
  const configKey = JSON.stringify(config ?? {});

  const pipelineRef = useRef<GesturePipeline | null>(null);
  useEffect(() => {
    const pipeline = new GesturePipeline(driver, configRef.current);
    pipelineRef.current = pipeline;
    return () => {
      const onCommand = onCommandRef.current;
      pipeline.dispose().forEach((cmd) => onCommand?.(cmd));
      if (pipelineRef.current === pipeline) pipelineRef.current = null;
    };
  }, [driver, configKey]);

  const onErrorRef = useRef(options.onError);
  useEffect(() => {
    onErrorRef.current = options.onError;
  }, [options.onError]);

  const onDebugFrameRef = useRef(options.onDebugFrame);
  useEffect(() => {
    onDebugFrameRef.current = options.onDebugFrame;
  }, [options.onDebugFrame]);

  const lastFrameTs = useRef<number>(0);
  const rafRef = useRef<number | null>(null);
  const streamRef = useRef<MediaStream | null>(null);

  useEffect(() => {
    let cancelled = false;

    async function startWebcam() {
      if (typeof navigator === "undefined" || !navigator.mediaDevices?.getUserMedia) {
        handleError({ type: "no-webcam" });
        return;
      }
      try {
        const stream = await navigator.mediaDevices.getUserMedia({ video: true });
        streamRef.current = stream;
        if (videoRef.current) {
          videoRef.current.srcObject = stream;
          try {
            await videoRef.current.play();
          } catch (err: unknown) {
            if (!(err instanceof Error) || err.name !== "AbortError") {
              throw err;
            }
          }
        }
        startLoop();
      } catch (err: unknown) {
        const name = err instanceof Error ? err.name : undefined;
        if (name === "NotAllowedError" || name === "SecurityError") {
          handleError({ type: "webcam-permission-denied" });
          return;
        }
        handleError({ type: "model-init-failed", error: err });
      }
    }

    function stopWebcam() {
      if (rafRef.current !== null) cancelAnimationFrame(rafRef.current);
      rafRef.current = null;
      if (streamRef.current) {
        streamRef.current.getTracks().forEach((t) => t.stop());
        streamRef.current = null;
      }
      const ctx = overlayRef.current?.getContext("2d");
      if (ctx && overlayRef.current) {
        ctx.clearRect(0, 0, overlayRef.current.width, overlayRef.current.height);
      }
    }

    const startLoop = () => {
      const tick = async () => {
        if (cancelled) return;
        const videoEl = videoRef.current;
        const pipeline = pipelineRef.current;
        const scheduleNext = () => {
          if (cancelled) return;
          rafRef.current = requestAnimationFrame(() => {
            void tick();
          });
        };

        if (!model || !videoEl || !pipeline) {
          scheduleNext();
          return;
        }

        const now = performance.now();
        const sinceLast = lastFrameTs.current ? now - lastFrameTs.current : undefined;
        if (fps && sinceLast && sinceLast < 1000 / fps) {
          scheduleNext();
          return;
        }
        lastFrameTs.current = now;

        try {
          const frame = await runGestureFrame({ model, video: videoEl, pipeline, timestamp: now, sinceLast, debug });
          if (cancelled) return;

          drawOverlay({
            canvas: overlayRef.current,
            hands: frame.hands,
            gestures: debug ? frame.gestures : undefined,
          });

          const onCommand = onCommandRef.current;
          if (onCommand) {
            frame.commands.forEach((cmd) => onCommand(cmd));
          }
          onDebugFrameRef.current?.(frame);
        } catch (err) {
          handleError({ type: "frame-failed", error: err });
        }

        scheduleNext();
      };

      rafRef.current = requestAnimationFrame(() => {
        void tick();
      });
    };

    if (model) {
      void startWebcam();
    } else {
      stopWebcam();
    }

    return () => {
      cancelled = true;
      stopWebcam();
    };
  }, [model, fps, debug]);

  return { videoRef, overlayRef } as const;

  function handleError(err: GestureError) {
    onErrorRef.current?.(err);
    // Keep console fallback for visibility during development
    console.error(err);
  }
}
