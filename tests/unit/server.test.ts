import type { IncomingHttpHeaders } from "node:http";
import { describe, expect, it } from "vitest";
import { endpoint } from "../../src/presentation/endpoint.js";
import { createRouter } from "../../src/presentation/routes/router.js";
import {
  createRequestListener,
  type NodeRequestLike,
  type NodeResponseLike,
  PayloadTooLargeError,
  readBody,
  toRequest,
  writeResponse,
} from "../../src/presentation/server.js";
import { createMemoryLogger } from "../support/memory-logger.js";

interface FakeRequestInit {
  readonly method?: string;
  readonly url?: string;
  readonly headers?: IncomingHttpHeaders;
  readonly chunks?: ReadonlyArray<string | Uint8Array>;
}

const fakeRequest = (init: FakeRequestInit = {}): NodeRequestLike => ({
  method: init.method ?? "GET",
  url: init.url ?? "/",
  headers: init.headers ?? {},
  socket: { remoteAddress: "127.0.0.1" },
  async *[Symbol.asyncIterator]() {
    for (const chunk of init.chunks ?? []) yield chunk;
  },
});

interface Sent {
  status: number;
  headers: Record<string, string | string[]>;
  body: string;
}

const fakeResponse = (): NodeResponseLike & { readonly sent: Sent } => {
  const sent: Sent = { status: 0, headers: {}, body: "" };
  return {
    sent,
    writeHead(statusCode, headers) {
      sent.status = statusCode;
      sent.headers = headers;
    },
    end(chunk) {
      sent.body = chunk === undefined ? "" : new TextDecoder().decode(chunk);
    },
  };
};

const CONFIG = { port: 3000, host: "localhost", maxBodySize: 16, shutdownTimeoutMs: 1_000 };

const listenerFor = () => {
  const logger = createMemoryLogger();
  const router = createRouter({ logger });
  router.register(endpoint("POST", "/echo", async (req) => new Response(await req.text())));
  const listener = createRequestListener({ config: CONFIG, logger, router, logFormat: "json" });
  return { logger, listener };
};

describe("readBody", () => {
  it("joins string and byte chunks", async () => {
    const result = await readBody(fakeRequest({ chunks: ["ab", new Uint8Array([99])] }), 10);
    expect(result.ok && new TextDecoder().decode(result.value)).toBe("abc");
  });

  it("gives up past the limit", async () => {
    const result = await readBody(fakeRequest({ chunks: ["abcd", "efgh"] }), 6);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PayloadTooLargeError);
      expect(result.error.limit).toBe(6);
    }
  });
});

describe("toRequest", () => {
  it("copies method, url and headers", () => {
    const req = toRequest(
      fakeRequest({
        method: "post",
        url: "/orders?page=2",
        headers: { "content-type": "application/json", "x-tag": ["a", "b"] },
      }),
      new TextEncoder().encode("{}"),
      "http://localhost:3000",
    );

    expect(req.method).toBe("POST");
    expect(req.url).toBe("http://localhost:3000/orders?page=2");
    expect(req.headers.get("x-tag")).toBe("a, b");
    expect(req.body).not.toBeNull();
  });

  it("drops the body of a GET request", () => {
    const req = toRequest(fakeRequest(), new TextEncoder().encode("x"), "http://localhost");
    expect(req.body).toBeNull();
  });
});

describe("writeResponse", () => {
  it("fills in default headers the response lacks", async () => {
    const res = fakeResponse();
    const headers = new Headers({ "X-Request-Id": "own" });
    headers.append("Set-Cookie", "a=1");
    headers.append("Set-Cookie", "b=2");

    await writeResponse(res, new Response("hi", { status: 201, headers }), {
      "X-Request-Id": "default",
      "X-Other": "filled",
    });

    expect(res.sent.status).toBe(201);
    expect(res.sent.headers["x-request-id"]).toBe("own");
    expect(res.sent.headers["x-other"]).toBe("filled");
    expect(res.sent.headers["set-cookie"]).toEqual(["a=1", "b=2"]);
    expect(res.sent.body).toBe("hi");
  });
});

describe("createRequestListener", () => {
  it("routes a buffered request and tags the response", async () => {
    const { listener, logger } = listenerFor();
    const res = fakeResponse();

    await listener(
      fakeRequest({
        method: "POST",
        url: "/echo",
        headers: { "x-request-id": "rid-1" },
        chunks: ["hello"],
      }),
      res,
    );

    expect(res.sent.status).toBe(200);
    expect(res.sent.body).toBe("hello");
    expect(res.sent.headers["x-request-id"]).toBe("rid-1");
    expect(logger.records.find((r) => r.msg === "Request handled")?.meta).toMatchObject({
      method: "POST",
      path: "/echo",
      status: 200,
      requestId: "rid-1",
    });
  });

  it("refuses a declared length over the limit", async () => {
    const { listener, logger } = listenerFor();
    const res = fakeResponse();

    await listener(
      fakeRequest({ method: "POST", url: "/echo", headers: { "content-length": "1000" } }),
      res,
    );

    expect(res.sent.status).toBe(413);
    expect(res.sent.headers["content-type"]).toBe("application/problem+json; charset=utf-8");
    expect(JSON.parse(res.sent.body)).toMatchObject({ code: "413-01", instance: "/echo" });
    expect(logger.messages("warn")).toEqual(["Request body exceeds max bytes limit"]);
  });

  it("refuses a streamed body over the limit", async () => {
    const { listener } = listenerFor();
    const res = fakeResponse();

    await listener(
      fakeRequest({ method: "POST", url: "/echo", chunks: ["0123456789", "0123456789"] }),
      res,
    );

    expect(res.sent.status).toBe(413);
  });
});
