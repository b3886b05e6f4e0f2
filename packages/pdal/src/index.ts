export * from "./dem/products";
export * from "./elapsed";
export * from "./errors";
export * from "./options";
export * from "./pdal";
export * from "./pipeline";
export * from "./site";
