/**
 * Procedural room generation.
 *
 * A room is built by a pipeline that applies generation steps, in order,
 * to a single room backend.
 *
 * @example
 * ```typescript
 * import {
 *   EmptyRoomStep,
 *   RoomPipeline,
 *   SparseRoom,
 *   WalledRoomStep,
 *   size,
 * } from "@roomforge/procgen";
 *
 * const result = RoomPipeline.create(new SparseRoom())
 *   .genWith(new EmptyRoomStep(size(40, 30)))
 *   .gen(WalledRoomStep)
 *   .build();
 *
 * if (result.success) {
 *   console.log(result.room.size()); // { width: 42, height: 32 }
 * }
 * ```
 */

export * from "./core";
export * from "./pipeline";
export * from "./rooms";
export * from "./steps";
export * from "./validation";
