/**
 * Return portal tests
 */

import { SeededRandom } from "@roomforge/contracts";
import { describe, expect, it } from "vitest";
import {
  EdgePortalsStep,
  EmptyRoomStep,
  localPosition,
  ReciprocatePortalsStep,
  RoomPipeline,
  RoomRegistry,
  size,
  SparseRoom,
  TileType,
  TraversePortalsStep,
} from "../src";
import { createContext, expectSuccess } from "./helpers";

function carved(id: string, width: number, height: number): SparseRoom {
  const room = new SparseRoom({ id });
  new EmptyRoomStep(size(width, height)).apply(room, createContext());
  return room;
}

describe("ReciprocatePortalsStep", () => {
  it("links every target back to the room", () => {
    const result = expectSuccess(
      RoomPipeline.create(new SparseRoom({ id: "hub" }), { seed: 4 })
        .genWith(new EmptyRoomStep(size(12, 8)))
        .genWith(new EdgePortalsStep({ count: 2 }))
        .genWith(
          new TraversePortalsStep(
            new EmptyRoomStep(size(5, 4)),
            (id) => new SparseRoom({ id }),
          ),
        )
        .gen(ReciprocatePortalsStep)
        .build(),
    );

    const links = result.room.portals();
    expect(links).toHaveLength(2);
    for (const link of links) {
      const target = result.rooms.get(link.target);
      const back = target?.portals() ?? [];

      expect(back).toHaveLength(1);
      expect(back[0]?.target).toBe("hub");
      expect(back[0]?.direction).toBe("south");
      expect(back[0]?.exit).toEqual(link.position);
      expect(link.exit).toEqual(back[0]?.position);

      const position = back[0]?.position;
      expect(position?.y).toBe(0);
      expect(position?.x).toBeGreaterThanOrEqual(1);
      expect(position?.x).toBeLessThanOrEqual(3);
      if (position) {
        expect(target?.tileTypeAtLocal(position)).toBe(TileType.PORTAL);
      }
    }
  });

  it("adds nothing on a second pass", () => {
    const result = expectSuccess(
      RoomPipeline.create(new SparseRoom({ id: "hub" }), { trace: true })
        .genWith(new EmptyRoomStep(size(12, 8)))
        .genWith(new EdgePortalsStep({ count: 2 }))
        .genWith(
          new TraversePortalsStep(
            new EmptyRoomStep(size(5, 4)),
            (id) => new SparseRoom({ id }),
          ),
        )
        .gen(ReciprocatePortalsStep)
        .gen(ReciprocatePortalsStep)
        .build(),
    );

    const placements = result.trace.filter(
      (event) =>
        event.stepId === "reciprocate-portals" &&
        event.eventType === "decision",
    );
    expect(placements).toHaveLength(2);
    expect(result.rooms.get("hub/portal-0")?.portals()).toHaveLength(1);
    expect(result.rooms.get("hub/portal-1")?.portals()).toHaveLength(1);
  });

  it("pairs with a return portal named by the link's exit", () => {
    const ctx = createContext(9);
    const hall = carved("hall", 5, 5);
    hall.addPortal({
      position: localPosition(4, 2),
      direction: "west",
      target: "hub",
    });
    ctx.rooms.add(hall);

    const hub = carved("hub", 5, 5);
    hub.addPortal({
      position: localPosition(0, 2),
      direction: "east",
      target: "hall",
      exit: localPosition(4, 2),
    });

    new ReciprocatePortalsStep().apply(hub, ctx);

    expect(hall.portals()).toEqual([
      {
        position: localPosition(4, 2),
        direction: "west",
        target: "hub",
        exit: localPosition(0, 2),
      },
    ]);
    expect(ctx.rng.next()).toBe(new SeededRandom(9).next());
  });

  it("warns about targets that are not registered", () => {
    const ctx = createContext();
    const hub = carved("hub", 5, 5);
    hub.addPortal({
      position: localPosition(0, 2),
      direction: "east",
      target: "nowhere",
    });

    new ReciprocatePortalsStep().apply(hub, ctx);

    expect(ctx.trace.getEvents().map((event) => event.data)).toEqual([
      { message: 'Portal target "nowhere" is not a registered room' },
    ]);
    expect(hub.portals()[0]?.exit).toBeUndefined();
  });

  it("skips targets too small for a return portal", () => {
    const ctx = createContext();
    ctx.rooms.add(carved("closet", 2, 2));
    const hub = carved("hub", 5, 5);
    hub.addPortal({
      position: localPosition(0, 2),
      direction: "east",
      target: "closet",
    });

    new ReciprocatePortalsStep().apply(hub, ctx);

    expect(ctx.trace.getEvents().map((event) => event.data)).toEqual([
      { message: 'Room "closet" (2x2) is too small for a return portal' },
    ]);
    expect(ctx.rooms.get("closet")?.portals()).toEqual([]);
  });

  it("uses rooms registered by the caller", () => {
    const rooms = new RoomRegistry();
    rooms.add(carved("vault", 4, 4));

    const result = expectSuccess(
      RoomPipeline.create(new SparseRoom({ id: "hub" }), {}, { rooms })
        .genWith(new EmptyRoomStep(size(5, 5)))
        .genWith(new EdgePortalsStep({ target: () => "vault" }))
        .gen(ReciprocatePortalsStep)
        .build(),
    );

    expect(result.rooms).toBe(rooms);
    expect(rooms.get("vault")?.portals()).toHaveLength(1);
  });
});
