export * from "./event.normalizer";
export * from "./field-readers";
export * from "./collect-records";
