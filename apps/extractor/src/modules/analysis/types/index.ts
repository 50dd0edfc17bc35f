export * from "./constants";
export * from "./stats.types";
