export * from "./round.extractor";
export * from "./kill.extractor";
export * from "./damage.extractor";
export * from "./utility.extractor";
export * from "./economy.extractor";
export * from "./player.extractor";
