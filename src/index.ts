export * from "./constants";
export * from "./errors";
export * from "./math";
export * from "./curve";
export * from "./fees";
export * from "./market";
export * from "./swap";
export * from "./types";
export { createLogger, type Logger } from "./logger";
