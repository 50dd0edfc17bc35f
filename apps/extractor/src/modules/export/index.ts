export * from "./export.module";
export * from "./export.service";
export * from "./csv.serializer";
