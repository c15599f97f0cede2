/**
 * Shared type foundations: capability interfaces and the error taxonomy.
 */

export * from "./capabilities.js";
export * from "./errors.js";
