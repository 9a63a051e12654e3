export * from "./logger";
export * from "./clients/http";
export * from "./clients/serpapi";
export * from "./clients/careerjet";
export * from "./sources";
export * from "./queue";
export * from "./scheduler";
export * from "./ingestion";
