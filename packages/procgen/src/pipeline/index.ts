/**
 * Pipeline module - ordered application of steps to one room.
 */

export * from "./builder";
export * from "./config";
export * from "./trace";
export * from "./types";
