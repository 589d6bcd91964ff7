export * from "./useGestureControl";
export * from "./frame";
export * from "./overlay";
