/**
 * Tile types for room maps. VOID is the absence of a tile: any position
 * never written reads as VOID.
 */
export const TileType = {
  VOID: 0,
  FLOOR: 1,
  WALL: 2,
  PORTAL: 3,
} as const;

export type TileType = (typeof TileType)[keyof typeof TileType];

const TILE_NAMES: Record<TileType, string> = {
  [TileType.VOID]: "void",
  [TileType.FLOOR]: "floor",
  [TileType.WALL]: "wall",
  [TileType.PORTAL]: "portal",
};

export const ALL_TILE_TYPES: readonly TileType[] = [
  TileType.VOID,
  TileType.FLOOR,
  TileType.WALL,
  TileType.PORTAL,
];

export function tileTypeName(type: TileType): string {
  return TILE_NAMES[type];
}

export function isTileType(value: number): value is TileType {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

/**
 * Read-only tile storage
 */
export interface ReadonlyTileStore {
  get(x: number, y: number): TileType;
  /** Visit every non-VOID tile. Order is unspecified. */
  forEach(callback: (x: number, y: number, type: TileType) => void): void;
  /** Stored cells of a type. Unbounded stores hold no VOID cells. */
  count(type: TileType): number;
}

/**
 * Mutable tile storage. Overwriting with VOID is the way to erase.
 */
export interface TileStore extends ReadonlyTileStore {
  set(x: number, y: number, type: TileType): void;
}
