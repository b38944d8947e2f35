export * from "./types";
export * from "./errors";
export * from "./logger";
export { decodeMessage } from "./decodeMessage";
export { signOf } from "./signOf";
