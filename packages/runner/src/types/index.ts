export * from "./report.js";
export * from "./config.js";
export * from "./run.js";
