/**
 * @tensorgrad/core -- shared types, errors, ports and utilities.
 */
export * from "./types.js";
export * from "./errors.js";
export * from "./broadcast.js";
export * from "./interfaces.js";
export * from "./config.js";
export { Registry } from "./registry.js";
export { SeededRng, uniform, normal, permutation } from "./rng.js";
export { hashConfig } from "./hash.js";
