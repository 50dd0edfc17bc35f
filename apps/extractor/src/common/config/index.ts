export * from "./environment";
export * from "./extraction.config";
