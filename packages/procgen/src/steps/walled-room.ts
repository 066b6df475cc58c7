import {
  type Adjacency,
  parseWith,
  WallSynthesisOptionsSchema,
} from "@roomforge/contracts";
import {
  DIRECTIONS_4,
  DIRECTIONS_8,
  type LocalPosition,
  localPosition,
  type Offset,
  positionKey,
} from "../core/geometry";
import { TileType } from "../core/tiles";
import type { GenerationStep, StepContext } from "../pipeline/types";
import type { Room } from "../rooms/types";

export interface WalledRoomOptions {
  /**
   * Which neighbours of a floor tile receive walls.
   * `"moore"` (8 neighbours, default) closes the corners;
   * `"von-neumann"` (4 neighbours) leaves them open.
   */
  readonly adjacency?: Adjacency;
  /** Keep PORTAL tiles next to floor. Defaults to true. */
  readonly preservePortals?: boolean;
}

const DEFAULT_ADJACENCY: Adjacency = "moore";

/**
 * Wall synthesis: surround every FLOOR tile with WALL.
 *
 * A neighbour becomes WALL when it is VOID or outside the bounds. All
 * targets are collected before anything is written, so the outcome does
 * not depend on scan order, and FLOOR is never overwritten. Running the
 * step twice gives the same map as running it once.
 *
 * Neighbours a fixed-size room cannot hold are skipped with a trace warning.
 */
export class WalledRoomStep implements GenerationStep {
  readonly id = "walled-room";
  readonly adjacency: Adjacency;
  readonly preservePortals: boolean;

  constructor(options: WalledRoomOptions = {}) {
    const parsed = parseWith(
      WallSynthesisOptionsSchema,
      options,
      "wall synthesis options",
    ).getOrThrow();
    this.adjacency = parsed.adjacency ?? DEFAULT_ADJACENCY;
    this.preservePortals = parsed.preservePortals ?? true;
  }

  apply(room: Room, ctx: StepContext): void {
    const offsets: readonly Offset[] =
      this.adjacency === "moore" ? DIRECTIONS_8 : DIRECTIONS_4;
    const targets = new Map<string, LocalPosition>();
    const unreachable = new Set<string>();

    room.forEachTile((p, type) => {
      if (type !== TileType.FLOOR) return;

      for (const offset of offsets) {
        const x = p.x + offset.x;
        const y = p.y + offset.y;
        const key = positionKey(x, y);
        if (targets.has(key) || unreachable.has(key)) continue;

        const neighbour = localPosition(x, y);
        const current = room.tileTypeAtLocal(neighbour);

        if (current === undefined) {
          if (!room.canContain({ x, y, width: 1, height: 1 })) {
            unreachable.add(key);
            continue;
          }
        } else if (!this.isReplaceable(current)) {
          continue;
        }

        targets.set(key, neighbour);
      }
    });

    for (const target of targets.values()) {
      room.setTileAtLocal(target, TileType.WALL);
    }

    ctx.trace.decision(
      this.id,
      "Wall adjacency",
      ["moore", "von-neumann"],
      this.adjacency,
      `Placed ${targets.size} walls`,
    );

    if (unreachable.size > 0) {
      ctx.trace.warning(
        this.id,
        `${unreachable.size} wall positions lie outside fixed room "${room.id}"`,
      );
    }
  }

  private isReplaceable(type: TileType): boolean {
    if (type === TileType.VOID) return true;
    return type === TileType.PORTAL && !this.preservePortals;
  }
}
