export * from "./stream-utils";
