export * from "./assertions.js";
export * from "./encoding.js";
