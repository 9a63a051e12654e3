export { SerpApiAdapter } from "./serpApiAdapter";
export type { SerpApiAdapterConfig } from "./serpApiAdapter";
export { mapSerpApiJob, countryCodeForLocation } from "./mappers";
