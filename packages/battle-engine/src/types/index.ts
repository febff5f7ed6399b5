export * from "./stats.js";
export * from "./combatants.js";
export * from "./items.js";
export * from "./actions.js";
export * from "./config.js";
