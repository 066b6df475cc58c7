export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./schemas/geometry";
export * from "./schemas/pipeline";
export * from "./types/error";
export * from "./types/result";
export * from "./utils/parse";
