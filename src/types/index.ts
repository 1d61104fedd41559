export * from "./config.js";
export * from "./case.js";
export * from "./result.js";
