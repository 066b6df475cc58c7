export * from "./compute-stats";
export * from "./result-types";
export * from "./validate-room";
