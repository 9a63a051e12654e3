export * from "./env";
export * from "./staticConfig";
