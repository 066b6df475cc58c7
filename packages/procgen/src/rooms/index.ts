export * from "./base-room";
export * from "./fixed-room";
export * from "./registry";
export * from "./sparse-room";
export * from "./types";
