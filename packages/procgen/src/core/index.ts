/**
 * Core module - geometry and tile primitives.
 */

export * from "./geometry";
export * from "./tiles";
