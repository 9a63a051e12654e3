export { CareerjetAdapter, parseCareerjetPageToken } from "./careerjetAdapter";
export type { CareerjetAdapterConfig } from "./careerjetAdapter";
export { mapCareerjetJob, currencyForLocale } from "./mappers";
