export * from "./config.js";
export { CursorStore } from "./cursorStore.js";
export type { FileCursor } from "./cursorStore.js";
export { DEFAULT_CONFIG } from "./defaults.js";
export * from "./discovery.js";
export { BadRequestError, NotFoundError } from "./errors.js";
export * from "./exporter.js";
export { readCustomTitle, sidecarPathFor, writeCustomTitle } from "./metadata.js";
export * from "./normalizers/index.js";
export { PollScheduler } from "./scheduler.js";
export type { PollSchedulerOptions } from "./scheduler.js";
export * from "./search/index.js";
export * from "./sessionAggregator.js";
export { SessionIndex } from "./sessionIndex.js";
export type { SessionIndexOptions } from "./sessionIndex.js";
export * from "./tailer.js";
export { removeLine } from "./transcriptFiles.js";
export * from "./utils.js";
export { WriteLock } from "./writeLock.js";
