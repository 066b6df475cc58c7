import { GenerationError } from "@roomforge/contracts";
import type { ReadonlyRoom, Room, RoomId } from "./types";

/**
 * Builds the room a portal leads to, the first time it is reached.
 * The returned room must carry `id`.
 */
export type RoomFactory = (id: RoomId) => Room;

/**
 * Read-only view handed back with pipeline results.
 */
export interface ReadonlyRoomRegistry {
  readonly size: number;
  get(id: RoomId): ReadonlyRoom | undefined;
  has(id: RoomId): boolean;
  ids(): readonly RoomId[];
}

/**
 * Every room of one generation run, keyed by id.
 *
 * Portal links name their target by id; the registry is where those ids
 * are resolved. Rooms are registered once and never replaced.
 */
export class RoomRegistry implements ReadonlyRoomRegistry {
  private readonly rooms = new Map<RoomId, Room>();

  get size(): number {
    return this.rooms.size;
  }

  get(id: RoomId): Room | undefined {
    return this.rooms.get(id);
  }

  has(id: RoomId): boolean {
    return this.rooms.has(id);
  }

  ids(): readonly RoomId[] {
    return [...this.rooms.keys()];
  }

  /**
   * Register `room`. Registering the same instance again is a no-op;
   * a different room under a taken id throws CONFIG_INVALID.
   */
  add(room: Room): void {
    const existing = this.rooms.get(room.id);
    if (existing === room) return;
    if (existing) {
      throw GenerationError.configInvalid(
        `Room id "${room.id}" is already registered`,
        { roomId: room.id },
      );
    }
    this.rooms.set(room.id, room);
  }

  /**
   * Room registered under `id`, created through `factory` when missing
   */
  resolve(id: RoomId, factory: RoomFactory): Room {
    const existing = this.rooms.get(id);
    if (existing) return existing;

    const room = factory(id);
    if (room.id !== id) {
      throw GenerationError.configInvalid(
        `Room factory returned "${room.id}" for portal target "${id}"`,
        { expected: id, actual: room.id },
      );
    }
    this.rooms.set(id, room);
    return room;
  }
}
