/**
 * Tile store backends: an unbounded map and a fixed dense array.
 */

import { GenerationError } from "@roomforge/contracts";
import { positionKey } from "../geometry";
import { isTileType, TileType, type TileStore } from "./types";

function toTileType(value: number | undefined): TileType {
  return value !== undefined && isTileType(value) ? value : TileType.VOID;
}

/**
 * Map-backed store with no size limit.
 * Only non-VOID tiles are kept; writing VOID deletes the entry.
 */
export class SparseTileStore implements TileStore {
  private readonly tiles = new Map<
    string,
    { readonly x: number; readonly y: number; type: TileType }
  >();

  get(x: number, y: number): TileType {
    return this.tiles.get(positionKey(x, y))?.type ?? TileType.VOID;
  }

  set(x: number, y: number, type: TileType): void {
    const key = positionKey(x, y);
    if (type === TileType.VOID) {
      this.tiles.delete(key);
      return;
    }
    this.tiles.set(key, { x, y, type });
  }

  forEach(callback: (x: number, y: number, type: TileType) => void): void {
    for (const tile of this.tiles.values()) {
      callback(tile.x, tile.y, tile.type);
    }
  }

  count(type: TileType): number {
    if (type === TileType.VOID) return 0;
    let total = 0;
    for (const tile of this.tiles.values()) {
      if (tile.type === type) total++;
    }
    return total;
  }

  get tileCount(): number {
    return this.tiles.size;
  }
}

/**
 * Flat Uint8Array store of a fixed width × height.
 * Reads outside return VOID; writes outside throw OUT_OF_BOUNDS.
 */
export class DenseTileStore implements TileStore {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;

  constructor(width: number, height: number) {
    if (
      !Number.isSafeInteger(width) ||
      !Number.isSafeInteger(height) ||
      width < 0 ||
      height < 0
    ) {
      throw GenerationError.invalidGeometry(
        `Invalid tile store dimensions: ${width}x${height}`,
        { width, height },
      );
    }
    this.width = width;
    this.height = height;
    // VOID is 0, so a fresh array is all VOID
    this.data = new Uint8Array(width * height);
  }

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  get(x: number, y: number): TileType {
    if (!this.isInBounds(x, y)) return TileType.VOID;
    return toTileType(this.data[y * this.width + x]);
  }

  set(x: number, y: number, type: TileType): void {
    if (!this.isInBounds(x, y)) {
      throw GenerationError.outOfBounds(
        `Tile (${x}, ${y}) is outside the ${this.width}x${this.height} store`,
        { x, y, width: this.width, height: this.height },
      );
    }
    this.data[y * this.width + x] = type;
  }

  forEach(callback: (x: number, y: number, type: TileType) => void): void {
    for (let y = 0; y < this.height; y++) {
      const row = y * this.width;
      for (let x = 0; x < this.width; x++) {
        const value = toTileType(this.data[row + x]);
        if (value !== TileType.VOID) callback(x, y, value);
      }
    }
  }

  count(type: TileType): number {
    let total = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === type) total++;
    }
    return total;
  }
}
