export * from "./extraction.module";
export * from "./extraction.service";
