import { areaContains, DIRECTIONS_8, offsetLocal } from "../core/geometry";
import { TileType, tileTypeName } from "../core/tiles";
import type { ReadonlyRoom } from "../rooms/types";
import {
  hasErrorViolations,
  type RoomValidationResult,
  type Violation,
} from "./result-types";

function checkBoundsConsistent(room: ReadonlyRoom): Violation[] {
  const violations: Violation[] = [];
  const bounds = room.area();

  room.forEachTile((p, type) => {
    if (!areaContains(bounds, p.x, p.y)) {
      violations.push({
        type: "invariant.bounds.consistent",
        message: `${tileTypeName(type)} tile at (${p.x}, ${p.y}) lies outside the room bounds`,
        severity: "error",
      });
    }
  });

  return violations;
}

function checkFloorEnclosed(room: ReadonlyRoom): Violation[] {
  const violations: Violation[] = [];

  room.forEachTile((p, type) => {
    if (type !== TileType.FLOOR) return;

    for (const offset of DIRECTIONS_8) {
      const neighbour = room.tileTypeAtLocal(
        offsetLocal(p, offset.x, offset.y),
      );
      if (neighbour === undefined || neighbour === TileType.VOID) {
        violations.push({
          type: "invariant.floor.enclosed",
          message: `Floor at (${p.x}, ${p.y}) borders open space at (${p.x + offset.x}, ${p.y + offset.y})`,
          severity: "warning",
        });
        return;
      }
    }
  });

  return violations;
}

function checkPortalLinks(room: ReadonlyRoom): Violation[] {
  const violations: Violation[] = [];

  for (const link of room.portals()) {
    const tile = room.tileTypeAtLocal(link.position);
    if (tile !== TileType.PORTAL) {
      violations.push({
        type: "invariant.portal.tile",
        message: `Portal to "${link.target}" at (${link.position.x}, ${link.position.y}) is not on a PORTAL tile (found ${tile === undefined ? "out of bounds" : tileTypeName(tile)})`,
        severity: "error",
      });
    }
  }

  return violations;
}

/**
 * Validate a generated room.
 *
 * Checks:
 * - Every non-VOID tile lies inside the reported bounds (error)
 * - Every portal link sits on a PORTAL tile (error)
 * - Every FLOOR tile is fully enclosed, 8-neighbour (warning, since an
 *   unwalled room is a legal result)
 */
export function validateRoom(room: ReadonlyRoom): RoomValidationResult {
  const violations: Violation[] = [
    ...checkBoundsConsistent(room),
    ...checkPortalLinks(room),
    ...checkFloorEnclosed(room),
  ];

  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}
