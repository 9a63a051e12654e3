export * from "./logger";
export * from "./http";
export * from "./jobPosting";
export * from "./sources";
export * from "./db";
export * from "./taskLock";
export * from "./queue";
export * from "./tasks";
export * from "./schedule";
export * from "./runner";
