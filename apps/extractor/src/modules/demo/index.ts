export * from "./demo.module";
export * from "./parsed-demo.loader";
export * from "./parser.service";
