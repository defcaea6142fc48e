export * from "./core/types.js";
export * from "./core/kernel.js";
export * from "./core/stream.js";
export * from "./core/combinators.js";
export * from "./core/reify.js";
