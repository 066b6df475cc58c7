export * from "./tile-store";
export * from "./types";
