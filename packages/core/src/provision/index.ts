export * from "./dockerfile";
export * from "./entrypoint";
export * from "./errors";
export * from "./inspect";
export * from "./plan";
export * from "./requirements";
export * from "./schema";
export type * from "./types";
export * from "./validate";
