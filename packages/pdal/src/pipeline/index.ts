export * from "./builder";
export * from "./schema";
export * from "./stages";
