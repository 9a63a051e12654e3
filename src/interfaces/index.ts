export type { JobSourceAdapter } from "./sources/jobSourceAdapter";
