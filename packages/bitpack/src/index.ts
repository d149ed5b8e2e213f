export * from "./layout.js";
export * from "./storage.js";
export * from "./bitmask.js";
export * from "./bitpack.js";
export { defaultDebugAssertions } from "./config.js";
