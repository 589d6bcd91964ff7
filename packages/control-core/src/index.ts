export * from "./types";
export * from "./cursorDamping";
export * from "./PinchScrollSession";
export * from "./pointerCommands";
export * from "./RecordingPointerDriver";
export * from "./ControlMapper";
export * from "./config";
export * from "./GesturePipeline";
