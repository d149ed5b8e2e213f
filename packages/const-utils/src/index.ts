export * from "./typing.js";
export * from "./branding.js";
export * from "./numeric.js";
