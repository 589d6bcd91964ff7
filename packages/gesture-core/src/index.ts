export * from "./types";
export * from "./errors";
export * from "./fingerState";
export * from "./HandClassifier";
export * from "./assignHandRoles";
