import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../../src/infrastructure/logging/logger.js";

/** Capture what the logger writes to one stream. */
const capture = (stream: NodeJS.WriteStream): string[] => {
  const output: string[] = [];
  vi.spyOn(stream, "write").mockImplementation((chunk: string | Uint8Array) => {
    output.push(typeof chunk === "string" ? chunk : new TextDecoder().decode(chunk));
    return true;
  });
  return output;
};

const parseLine = (line: string | undefined): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(line ?? "");
  if (typeof parsed !== "object" || parsed === null) throw new Error("not a JSON object");
  return Object.fromEntries(Object.entries(parsed));
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Logger: JSON format", () => {
  it("json format outputs valid JSON lines", () => {
    const output = capture(process.stdout);
    createLogger({ format: "json" }).info("test message", { key: "value" });

    expect(output.length).toBe(1);
    const parsed = parseLine(output[0]);
    expect(parsed["level"]).toBe("info");
    expect(parsed["msg"]).toBe("test message");
    expect(parsed["key"]).toBe("value");
    expect(new Date(String(parsed["time"])).toISOString()).toBe(parsed["time"]);
  });

  it("json format includes bindings and child bindings", () => {
    const output = capture(process.stdout);
    createLogger({ format: "json", bindings: { service: "test" } })
      .child({ layer: "handler" })
      .info("hello");

    expect(parseLine(output[0])).toMatchObject({ service: "test", layer: "handler", msg: "hello" });
  });

  it("renders errors by their message", () => {
    const output = capture(process.stderr);
    createLogger({ format: "json" }).error("failed", { error: new Error("boom") });

    expect(parseLine(output[0])["error"]).toBe("boom");
  });
});

describe("Logger: levels and streams", () => {
  it("drops entries below the minimum level", () => {
    const output = capture(process.stdout);
    const logger = createLogger({ level: "warn", format: "json" });
    logger.debug("hidden");
    logger.info("hidden");

    expect(output).toEqual([]);
  });

  it("writes warnings and above to stderr", () => {
    const out = capture(process.stdout);
    const errOut = capture(process.stderr);
    const logger = createLogger({ format: "json" });
    logger.info("to stdout");
    logger.warn("to stderr");
    logger.fatal("to stderr too");

    expect(out.length).toBe(1);
    expect(errOut.length).toBe(2);
  });

  it("pretty format writes the message on one line", () => {
    const output = capture(process.stdout);
    createLogger({ format: "pretty" }).info("Route registered", { route: "GET /orders" });

    expect(output.length).toBe(1);
    expect(output[0]).toContain("Route registered");
    expect(output[0]).toContain("GET /orders");
    expect(output[0]?.endsWith("\n")).toBe(true);
  });
});

describe("Logger: pretty format", () => {
  it("prefixes the layer and shortens the request id", () => {
    const output = capture(process.stderr);
    createLogger({ format: "pretty", bindings: { requestId: "abcdefgh-1234" } })
      .child({ layer: "handler" })
      .warn("Handler failed to decode request data");

    expect(output[0]).toContain("[handler]");
    expect(output[0]).toContain("rid=abcdefgh");
    expect(output[0]).not.toContain("abcdefgh-1234");
  });
});
