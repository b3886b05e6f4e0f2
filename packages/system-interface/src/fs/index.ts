export { isNotFoundError } from "./helper";
export * from "./interfaces";
export * from "./node";
export * from "./virtual";
