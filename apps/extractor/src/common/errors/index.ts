export * from "./extraction.errors";
