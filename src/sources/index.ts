export {
  SourceRegistry,
  createDefaultSourceRegistry,
  isJobSource,
} from "./sourceRegistry";
export type { DefaultSourceOptions } from "./sourceRegistry";
