export * from "./report.module";
export * from "./report.service";
