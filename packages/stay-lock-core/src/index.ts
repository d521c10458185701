export * from "./errors.js";
export * from "./lockState.js";
export * from "./reconcile.js";
export * from "./report.js";
export * from "./resolve.js";
export * from "./runner.js";
export * from "./schedule.js";
export * from "./time.js";
export * from "./types.js";
