export * from "./round-stats.computer";
export * from "./player-stats.computer";
