import { describe, expect, it } from "vitest";
import { Err, GenerationError, Ok, Result } from "../src";

describe("Result", () => {
  it("wraps a value in Ok", () => {
    const res = Ok<number, string>(4);
    expect(res.isOk()).toBe(true);
    expect(res.success).toBe(true);
    expect(res.value).toBe(4);
    expect(() => res.error).toThrow("Cannot access error of Ok Result");
  });

  it("wraps an error in Err", () => {
    const res = Err<number, string>("nope");
    expect(res.isErr()).toBe(true);
    expect(res.error).toBe("nope");
    expect(() => res.value).toThrow("Cannot access value of Err Result");
  });

  it("maps values and errors independently", () => {
    expect(Ok<number, string>(2).map((n) => n * 3).value).toBe(6);
    expect(Err<number, string>("x").map((n) => n * 3).error).toBe("x");
    expect(Err<number, string>("x").mapErr((e) => e.length).error).toBe(1);
  });

  it("short-circuits flatMap on Err", () => {
    const half = (n: number): Result<number, string> =>
      n % 2 === 0 ? Ok(n / 2) : Err(`${n} is odd`);

    expect(Ok<number, string>(8).flatMap(half).flatMap(half).value).toBe(2);
    expect(Ok<number, string>(6).flatMap(half).flatMap(half).error).toBe(
      "3 is odd",
    );
  });

  it("falls back with getOrElse and rethrows with getOrThrow", () => {
    expect(Err<number, Error>(new Error("bad")).getOrElse(7)).toBe(7);
    expect(() => Err<number, Error>(new Error("bad")).getOrThrow()).toThrow(
      "bad",
    );
  });

  it("matches both branches", () => {
    const describeResult = (r: Result<number, string>) =>
      r.match(
        (v) => `ok:${v}`,
        (e) => `err:${e}`,
      );
    expect(describeResult(Ok(1))).toBe("ok:1");
    expect(describeResult(Err("boom"))).toBe("err:boom");
  });

  it("captures throws with fromThrowable", () => {
    const res = Result.fromThrowable(
      () => {
        throw GenerationError.outOfBounds("outside");
      },
      (e) => (GenerationError.is(e) ? e.code : "unknown"),
    );
    expect(res.error).toBe("OUT_OF_BOUNDS");

    expect(Result.fromThrowable(() => 5).value).toBe(5);
  });

  it("runs tapErr only for errors", () => {
    const seen: string[] = [];
    Ok<number, string>(1).tapErr((e) => seen.push(e));
    Err<number, string>("late").tapErr((e) => seen.push(e));
    expect(seen).toEqual(["late"]);
  });
});
