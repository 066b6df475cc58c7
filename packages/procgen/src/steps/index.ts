export * from "./conditional";
export * from "./edge-portals";
export * from "./empty-room";
export * from "./fill-tiles";
export * from "./reciprocate-portals";
export * from "./sequential";
export * from "./traverse-portals";
export * from "./walled-room";
