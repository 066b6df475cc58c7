/**
 * Edge portal placement tests
 */

import { SeededRandom } from "@roomforge/contracts";
import { describe, expect, it } from "vitest";
import {
  EdgePortalsStep,
  EmptyRoomStep,
  FixedRoom,
  type PortalLink,
  size,
  SparseRoom,
  TileType,
} from "../src";
import { createContext } from "./helpers";

function carvedRoom(width: number, height: number): FixedRoom {
  const room = new FixedRoom(size(width, height), { id: "crypt" });
  new EmptyRoomStep(size(width, height)).apply(room, createContext());
  return room;
}

function expectedDirection(link: PortalLink, width: number, height: number) {
  if (link.position.x === 0) return "east";
  if (link.position.x === width - 1) return "west";
  if (link.position.y === 0) return "south";
  if (link.position.y === height - 1) return "north";
  return undefined;
}

describe("EdgePortalsStep", () => {
  it("places portals on edges, away from corners", () => {
    const room = carvedRoom(10, 6);
    new EdgePortalsStep({ count: 8 }).apply(room, createContext(7));

    const links = room.portals();
    expect(links).toHaveLength(8);
    for (const link of links) {
      expect(room.tileTypeAtLocal(link.position)).toBe(TileType.PORTAL);
      expect(link.direction).toBe(expectedDirection(link, 10, 6));

      const onCorner =
        (link.position.x === 0 || link.position.x === 9) &&
        (link.position.y === 0 || link.position.y === 5);
      expect(onCorner).toBe(false);
    }
  });

  it("names targets after the room by default", () => {
    const room = carvedRoom(5, 5);
    new EdgePortalsStep({ count: 2 }).apply(room, createContext());
    expect(room.portals().map((link) => link.target)).toEqual([
      "crypt/portal-0",
      "crypt/portal-1",
    ]);
  });

  it("keeps numbering targets across placement steps", () => {
    const room = carvedRoom(5, 5);
    new EdgePortalsStep().apply(room, createContext(1));
    new EdgePortalsStep().apply(room, createContext(2));
    expect(room.portals().map((link) => link.target)).toEqual([
      "crypt/portal-0",
      "crypt/portal-1",
    ]);
  });

  it("uses a custom target resolver", () => {
    const room = carvedRoom(5, 5);
    new EdgePortalsStep({ target: (index) => `level-2:${index}` }).apply(
      room,
      createContext(),
    );
    expect(room.portals().map((link) => link.target)).toEqual(["level-2:0"]);
  });

  it("is deterministic for a seed", () => {
    const a = carvedRoom(12, 9);
    const b = carvedRoom(12, 9);
    new EdgePortalsStep({ count: 5 }).apply(a, createContext(99));
    new EdgePortalsStep({ count: 5 }).apply(b, createContext(99));
    expect(a.portals()).toEqual(b.portals());
  });

  it("draws three random values per portal", () => {
    const ctx = createContext(5);
    new EdgePortalsStep({ count: 2 }).apply(carvedRoom(8, 8), ctx);

    const reference = new SeededRandom(5);
    for (let i = 0; i < 6; i++) reference.next();
    expect(ctx.rng.getState()).toEqual(reference.getState());
  });

  it("skips rooms too small for a portal", () => {
    const room = new SparseRoom();
    const ctx = createContext();
    new EdgePortalsStep().apply(room, ctx);

    expect(room.portals()).toEqual([]);
    expect(ctx.trace.getEvents()).toEqual([
      expect.objectContaining({
        eventType: "skip",
        data: { reason: "Room 0x0 is too small for edge portals" },
      }),
    ]);
  });

  it("rejects a negative count", () => {
    expect(() => new EdgePortalsStep({ count: -1 })).toThrow(
      "Invalid edge portal options: count: Portal count must be non-negative",
    );
  });
});
