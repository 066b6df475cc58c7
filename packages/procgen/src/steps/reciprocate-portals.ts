import { localPosition, positionsEqual } from "../core/geometry";
import type { GenerationStep, StepContext } from "../pipeline/types";
import type { PortalLink, Room } from "../rooms/types";

const MIN_EDGE_LENGTH = 3;

function leadsBackTo(link: PortalLink, origin: Room, from: PortalLink): boolean {
  return (
    link.target === origin.id &&
    link.exit !== undefined &&
    positionsEqual(link.exit, from.position)
  );
}

/**
 * Give every outgoing portal a way back.
 *
 * For each link whose target room has no portal leading back onto it, a
 * return portal is placed on the target's top edge (facing south, corners
 * excluded) and both links record each other's position as `exit`. A link
 * whose `exit` already names an unpaired portal back to this room is paired
 * with it instead. One random value is drawn per portal placed.
 *
 * Targets must already be registered; use a traversal first to create them.
 */
export class ReciprocatePortalsStep implements GenerationStep {
  readonly id = "reciprocate-portals";

  apply(room: Room, ctx: StepContext): void {
    for (const link of [...room.portals()]) {
      const target = ctx.rooms.get(link.target);
      if (!target) {
        ctx.trace.warning(
          this.id,
          `Portal target "${link.target}" is not a registered room`,
        );
        continue;
      }

      if (target.portals().some((other) => leadsBackTo(other, room, link))) {
        continue;
      }

      if (this.pairExisting(room, link, target)) continue;

      const bounds = target.area();
      if (bounds.width < MIN_EDGE_LENGTH || bounds.height < MIN_EDGE_LENGTH) {
        ctx.trace.warning(
          this.id,
          `Room "${target.id}" (${bounds.width}x${bounds.height}) is too small for a return portal`,
        );
        continue;
      }

      const position = localPosition(
        bounds.x + ctx.rng.range(1, bounds.width - 2),
        bounds.y,
      );
      target.addPortal({
        position,
        direction: "south",
        target: room.id,
        exit: link.position,
      });
      room.replacePortal(link, { ...link, exit: position });

      ctx.trace.decision(
        this.id,
        "Return portal",
        [target.id],
        { x: position.x, y: position.y },
        `"${target.id}" leads back to (${link.position.x}, ${link.position.y}) in "${room.id}"`,
      );
    }
  }

  private pairExisting(room: Room, link: PortalLink, target: Room): boolean {
    const exit = link.exit;
    if (!exit) return false;

    const partner = target
      .portals()
      .find(
        (other) =>
          other.target === room.id && positionsEqual(other.position, exit),
      );
    if (!partner) return false;

    return target.replacePortal(partner, { ...partner, exit: link.position });
  }
}
