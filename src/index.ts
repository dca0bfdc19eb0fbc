// src/index.ts
export * from "./layout/core/index.js";
export * from "./layout/interfaces.js";
export * from "./layout/errors.js";
export * from "./layout/geometry.js";
export * from "./layout/style.js";
