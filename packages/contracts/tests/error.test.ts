import { describe, expect, it } from "vitest";
import { GenerationError } from "../src";

describe("GenerationError", () => {
  it("carries code, message and details", () => {
    const error = GenerationError.capacityExceeded("too big", {
      width: 12,
    });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("GenerationError");
    expect(error.code).toBe("CAPACITY_EXCEEDED");
    expect(error.message).toBe("too big");
    expect(error.details).toEqual({ width: 12 });
  });

  it("has a factory per code", () => {
    expect(GenerationError.outOfBounds("a").code).toBe("OUT_OF_BOUNDS");
    expect(GenerationError.invalidGeometry("b").code).toBe("INVALID_GEOMETRY");
    expect(GenerationError.configInvalid("c").code).toBe("CONFIG_INVALID");
    expect(GenerationError.pipelineFinished("hall").code).toBe(
      "PIPELINE_FINISHED",
    );
  });

  it("keeps the wrapped value as cause", () => {
    const original = new TypeError("bad input");
    const error = GenerationError.stepFailed("step broke", original, {
      stepId: "custom",
    });
    expect(error.code).toBe("STEP_FAILED");
    expect(error.cause).toBe(original);
    expect(error.details).toEqual({ stepId: "custom" });
  });

  it("names the room in the finished-pipeline message", () => {
    expect(GenerationError.pipelineFinished("hall").message).toBe(
      'Pipeline for room "hall" has already been built',
    );
  });

  it("recognises its own instances", () => {
    expect(GenerationError.is(GenerationError.outOfBounds("x"))).toBe(true);
    expect(GenerationError.is(new Error("x"))).toBe(false);
    expect(GenerationError.is("x")).toBe(false);
  });

  it("serialises to JSON without undefined details", () => {
    expect(GenerationError.outOfBounds("outside").toJSON()).toEqual({
      name: "GenerationError",
      code: "OUT_OF_BOUNDS",
      message: "outside",
    });
    expect(
      GenerationError.outOfBounds("outside", { x: 4 }).toJSON(),
    ).toEqual({
      name: "GenerationError",
      code: "OUT_OF_BOUNDS",
      message: "outside",
      details: { x: 4 },
    });
  });
});
