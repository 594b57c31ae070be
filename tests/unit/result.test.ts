import { describe, expect, it } from "vitest";
import {
  err,
  map,
  mapErr,
  ok,
  type Result,
  settle,
  tryCatchAsync,
} from "../../src/core/types/result.js";

describe("Result monad", () => {
  it("ok wraps a value", () => {
    const r = ok(42);
    expect(r.ok).toBe(true);
    expect(r.value).toBe(42);
  });

  it("err wraps an error", () => {
    const r = err("fail");
    expect(r.ok).toBe(false);
    expect(r.error).toBe("fail");
  });

  it("map transforms ok value", () => {
    expect(map(ok(2), (n: number) => n * 3)).toEqual({ ok: true, value: 6 });
  });

  it("map passes through err", () => {
    const failed: Result<number, string> = err("x");
    expect(map(failed, (n: number) => n * 3)).toEqual({ ok: false, error: "x" });
  });

  it("mapErr transforms the failure only", () => {
    const failed: Result<number, string> = err("x");
    expect(mapErr(failed, (e) => e.toUpperCase())).toEqual({ ok: false, error: "X" });
    expect(mapErr(ok(1), (e: string) => e.length)).toEqual({ ok: true, value: 1 });
  });
});

describe("settle", () => {
  it("returns the result the function produced", async () => {
    expect(await settle(() => ok("done"))).toEqual({ ok: true, value: "done" });
    expect(await settle(async () => err("no"))).toEqual({ ok: false, error: "no" });
  });

  it("turns a throw into an err", async () => {
    const boom = new Error("boom");
    expect(
      await settle(() => {
        throw boom;
      }),
    ).toEqual({ ok: false, error: boom });
  });
});

describe("tryCatchAsync", () => {
  it("wraps success", async () => {
    expect(await tryCatchAsync(async () => 42)).toEqual({ ok: true, value: 42 });
  });

  it("catches rejections", async () => {
    const r = await tryCatchAsync(() => Promise.reject(new Error("boom")));
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error).toBeInstanceOf(Error);
  });
});
