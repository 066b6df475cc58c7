/**
 * Wall synthesis tests
 */

import { describe, expect, it } from "vitest";
import {
  area,
  EdgePortalsStep,
  EmptyRoomStep,
  FixedRoom,
  localPosition,
  type Room,
  size,
  SparseRoom,
  TileType,
  validateRoom,
  WalledRoomStep,
} from "../src";
import { createContext } from "./helpers";

function carve(room: Room, width: number, height: number): void {
  new EmptyRoomStep(size(width, height)).apply(room, createContext());
}

describe("WalledRoomStep", () => {
  it("closes a carved room with a full ring", () => {
    const room = new SparseRoom();
    carve(room, 40, 30);
    new WalledRoomStep().apply(room, createContext());

    expect(room.area()).toEqual({ x: -1, y: -1, width: 42, height: 32 });
    expect(room.countTiles(TileType.WALL)).toBe(144);
    expect(room.countTiles(TileType.FLOOR)).toBe(1200);
    expect(room.countTiles(TileType.VOID)).toBe(0);
    expect(room.tileTypeAtLocal(localPosition(-1, -1))).toBe(TileType.WALL);
    expect(room.tileTypeAtLocal(localPosition(40, 30))).toBe(TileType.WALL);
    expect(room.tileTypeAtLocal(localPosition(-2, 0))).toBeUndefined();
  });

  it("leaves corners open with 4-neighbour adjacency", () => {
    const room = new SparseRoom();
    carve(room, 3, 3);
    new WalledRoomStep({ adjacency: "von-neumann" }).apply(
      room,
      createContext(),
    );

    expect(room.area()).toEqual({ x: -1, y: -1, width: 5, height: 5 });
    expect(room.countTiles(TileType.WALL)).toBe(12);
    expect(room.tileTypeAtLocal(localPosition(-1, -1))).toBe(TileType.VOID);
    expect(room.tileTypeAtLocal(localPosition(-1, 0))).toBe(TileType.WALL);
  });

  it("does nothing to an empty room", () => {
    const room = new SparseRoom();
    const ctx = createContext();
    new WalledRoomStep().apply(room, ctx);

    expect(room.size()).toEqual({ width: 0, height: 0 });
    expect(ctx.trace.getEvents()).toEqual([
      expect.objectContaining({
        eventType: "decision",
        data: {
          question: "Wall adjacency",
          options: ["moore", "von-neumann"],
          chosen: "moore",
          reason: "Placed 0 walls",
        },
      }),
    ]);
  });

  it("is idempotent", () => {
    const room = new SparseRoom();
    carve(room, 4, 4);
    const step = new WalledRoomStep();
    step.apply(room, createContext());
    step.apply(room, createContext());

    expect(room.area()).toEqual({ x: -1, y: -1, width: 6, height: 6 });
    expect(room.countTiles(TileType.WALL)).toBe(20);
  });

  it("walls a carve inside a fixed room", () => {
    const room = new FixedRoom(size(6, 5));
    new EmptyRoomStep(area(1, 1, 4, 3)).apply(room, createContext());
    const ctx = createContext();
    new WalledRoomStep().apply(room, ctx);

    expect(room.countTiles(TileType.WALL)).toBe(18);
    expect(room.countTiles(TileType.VOID)).toBe(0);
    expect(ctx.trace.getEvents().map((e) => e.eventType)).toEqual([
      "decision",
    ]);
  });

  it("skips neighbours a fixed room cannot hold", () => {
    const room = new FixedRoom(size(5, 4), { id: "cell" });
    carve(room, 5, 4);
    const ctx = createContext();
    new WalledRoomStep().apply(room, ctx);

    expect(room.countTiles(TileType.WALL)).toBe(0);
    expect(ctx.trace.getEvents()[1]).toEqual(
      expect.objectContaining({
        stepId: "walled-room",
        eventType: "warning",
        data: { message: '22 wall positions lie outside fixed room "cell"' },
      }),
    );
  });

  it("keeps portals unless told otherwise", () => {
    const build = () => {
      const room = new FixedRoom(size(5, 5));
      new EmptyRoomStep(area(1, 1, 3, 3)).apply(room, createContext());
      room.addPortal({
        position: localPosition(0, 2),
        direction: "east",
        target: "hall",
      });
      return room;
    };

    const kept = build();
    new WalledRoomStep().apply(kept, createContext());
    expect(kept.tileTypeAtLocal(localPosition(0, 2))).toBe(TileType.PORTAL);
    expect(kept.countTiles(TileType.WALL)).toBe(15);

    const replaced = build();
    new WalledRoomStep({ preservePortals: false }).apply(
      replaced,
      createContext(),
    );
    expect(replaced.tileTypeAtLocal(localPosition(0, 2))).toBe(TileType.WALL);
    expect(replaced.countTiles(TileType.WALL)).toBe(16);
    expect(replaced.portals()).toEqual([]);
  });

  it("drops the links of portals it walls over", () => {
    const room = new SparseRoom();
    new EmptyRoomStep(size(6, 5)).apply(room, createContext());
    new EdgePortalsStep({ count: 2 }).apply(room, createContext());
    expect(room.portals()).toHaveLength(2);

    new WalledRoomStep({ preservePortals: false }).apply(room, createContext());

    expect(room.portals()).toEqual([]);
    expect(room.countTiles(TileType.PORTAL)).toBe(0);
    expect(validateRoom(room)).toEqual({ success: true, violations: [] });
  });

  it("never overwrites FLOOR", () => {
    const room = new SparseRoom();
    room.setTileAtLocal(localPosition(0, 0), TileType.FLOOR);
    room.setTileAtLocal(localPosition(2, 0), TileType.FLOOR);
    new WalledRoomStep().apply(room, createContext());

    expect(room.tileTypeAtLocal(localPosition(0, 0))).toBe(TileType.FLOOR);
    expect(room.tileTypeAtLocal(localPosition(2, 0))).toBe(TileType.FLOOR);
    expect(room.tileTypeAtLocal(localPosition(1, 0))).toBe(TileType.WALL);
    expect(room.countTiles(TileType.WALL)).toBe(13);
  });
});
