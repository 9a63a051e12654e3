/**
 * Utils barrel exports
 */

export * from "./backoff";
export * from "./jobFields";
export * from "./zodIssues";
export * from "./objects";
