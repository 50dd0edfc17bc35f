export * from "./trade.detector";
export * from "./clutch.detector";
