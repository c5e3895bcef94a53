export * from "./errors";
export * from "./config";
export * from "./coordinator";
export * from "./units";
export * from "./integration";
