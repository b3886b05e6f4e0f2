export * from "./cmd";
export * from "./fs";
export * from "./proc";
export * from "./sys";
