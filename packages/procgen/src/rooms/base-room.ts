import { GenerationError, Result } from "@roomforge/contracts";
import {
  type Area,
  type LocalPosition,
  localPosition,
  positionsEqual,
  type Position,
  type Size,
  toLocal,
  toWorld,
  WORLD_ORIGIN,
  areaContains,
  areaSize,
} from "../core/geometry";
import { TileType, type TileStore } from "../core/tiles";
import type { PortalLink, Room, RoomId, RoomOptions } from "./types";

export const DEFAULT_ROOM_ID: RoomId = "room";

function toGenerationError(error: unknown): GenerationError {
  if (GenerationError.is(error)) return error;
  return GenerationError.stepFailed(
    error instanceof Error ? error.message : String(error),
    error,
  );
}

/**
 * Shared behaviour of every backend. Subclasses decide the bounds and how
 * a write outside them is handled.
 */
export abstract class BaseRoom implements Room {
  readonly id: RoomId;
  readonly origin: Position;
  abstract readonly expandable: boolean;

  private readonly links: PortalLink[] = [];

  protected constructor(
    protected readonly store: TileStore,
    options: RoomOptions,
  ) {
    this.id = options.id ?? DEFAULT_ROOM_ID;
    this.origin = options.origin ?? WORLD_ORIGIN;
  }

  abstract area(): Area;
  abstract canContain(target: Area): boolean;
  protected abstract writeTile(x: number, y: number, type: TileType): void;

  size(): Size {
    return areaSize(this.area());
  }

  isInBounds(p: LocalPosition): boolean {
    return areaContains(this.area(), p.x, p.y);
  }

  tileTypeAtLocal(p: LocalPosition): TileType | undefined {
    if (!this.isInBounds(p)) return undefined;
    return this.store.get(p.x, p.y);
  }

  tileTypeAt(p: Position): TileType | undefined {
    return this.tileTypeAtLocal(this.toLocal(p));
  }

  toWorld(p: LocalPosition): Position {
    return toWorld(p, this.origin);
  }

  toLocal(p: Position): LocalPosition {
    return toLocal(p, this.origin);
  }

  setTileAtLocal(p: LocalPosition, type: TileType): void {
    const previous = this.tileTypeAtLocal(p);
    this.writeTile(p.x, p.y, type);
    if (previous === TileType.PORTAL && type !== TileType.PORTAL) {
      this.removePortalsAt(p);
    }
  }

  trySetTileAtLocal(
    p: LocalPosition,
    type: TileType,
  ): Result<void, GenerationError> {
    return Result.fromThrowable(
      () => this.setTileAtLocal(p, type),
      toGenerationError,
    );
  }

  setTileAt(p: Position, type: TileType): void {
    this.setTileAtLocal(this.toLocal(p), type);
  }

  forEachTile(callback: (p: LocalPosition, type: TileType) => void): void {
    this.store.forEach((x, y, type) => callback(localPosition(x, y), type));
  }

  countTiles(type: TileType): number {
    const bounds = this.area();
    if (type !== TileType.VOID) return this.store.count(type);

    let written = 0;
    this.store.forEach((x, y) => {
      if (areaContains(bounds, x, y)) written++;
    });
    return bounds.width * bounds.height - written;
  }

  portals(): readonly PortalLink[] {
    return this.links;
  }

  addPortal(link: PortalLink): void {
    this.setTileAtLocal(link.position, TileType.PORTAL);
    this.links.push(Object.freeze({ ...link }));
  }

  replacePortal(previous: PortalLink, next: PortalLink): boolean {
    const index = this.links.indexOf(previous);
    if (index === -1) return false;

    if (!positionsEqual(previous.position, next.position)) {
      throw GenerationError.invalidGeometry(
        `Replacement portal must stay at (${previous.position.x}, ${previous.position.y})`,
        { roomId: this.id, previous: previous.position, next: next.position },
      );
    }
    this.links[index] = Object.freeze({ ...next });
    return true;
  }

  removePortalsAt(p: LocalPosition): readonly PortalLink[] {
    const removed: PortalLink[] = [];
    for (let i = this.links.length - 1; i >= 0; i--) {
      const link = this.links[i];
      if (link && positionsEqual(link.position, p)) {
        removed.unshift(link);
        this.links.splice(i, 1);
      }
    }
    return removed;
  }
}
