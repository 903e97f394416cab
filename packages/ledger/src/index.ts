export * from "./errors.js";
export * from "./events.js";
export * from "./store.js";
export * from "./streak.js";
export * from "./payout.js";
export * from "./settlement.js";
export * from "./groupAchievement.js";
export * from "./completion.js";
export * from "./compensation.js";
export * from "./engine.js";
export * from "./memoryStore.js";
