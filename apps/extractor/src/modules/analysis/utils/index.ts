export * from "./math";
export * from "./grouping";
export * from "./identity";
