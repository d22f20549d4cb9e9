export * from "./config.js";
export * from "./db.js";
export * from "./errors.js";
export * from "./health.js";
export * from "./http.js";
export * from "./logger.js";
export * from "./metrics.js";
export * from "./types.js";
