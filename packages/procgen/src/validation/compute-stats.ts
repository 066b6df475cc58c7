import { type Size, areaSize } from "../core/geometry";
import { ALL_TILE_TYPES, TileType, tileTypeName } from "../core/tiles";
import type { ReadonlyRoom } from "../rooms/types";

export interface RoomStats {
  readonly size: Size;
  readonly cellCount: number;
  /** Keyed by tile name: void, floor, wall, portal */
  readonly tiles: Readonly<Record<string, number>>;
  readonly portalLinks: number;
  /** FLOOR share of all cells in bounds, 0 for an empty room */
  readonly floorRatio: number;
}

export function computeRoomStats(room: ReadonlyRoom): RoomStats {
  const bounds = areaSize(room.area());
  const cellCount = bounds.width * bounds.height;

  const tiles: Record<string, number> = {};
  for (const type of ALL_TILE_TYPES) {
    tiles[tileTypeName(type)] = room.countTiles(type);
  }

  const floor = room.countTiles(TileType.FLOOR);

  return {
    size: bounds,
    cellCount,
    tiles,
    portalLinks: room.portals().length,
    floorRatio: cellCount > 0 ? floor / cellCount : 0,
  };
}
