import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createProblemFactory, forbidden } from "../../src/core/errors/problem.js";
import { defineParams } from "../../src/core/params/definition.js";
import { err, ok } from "../../src/core/types/result.js";
import { required } from "../../src/infrastructure/validation/rules.js";
import type { Handler } from "../../src/presentation/context.js";
import { halt, proceedWith } from "../../src/presentation/guard.js";
import { type Action, createHandler, EMPTY_BODY_DETAIL } from "../../src/presentation/handler.js";
import { reply, withHeader } from "../../src/presentation/reply.js";
import { jsonBody, makeCall } from "../support/request.js";

const ItemParams = defineParams(
  z.object({
    page: z.number().int(),
    correlationId: required(z.string()),
  }),
  {
    page: "query=page,default=1",
    correlationId: "header=X-Correlation-Id",
  },
);

const NestedBody = z.object({
  inner: z.object({ thing: required(z.string()) }).default({ thing: "" }),
});

const OrderBody = z.object({
  item: required(z.string()),
  quantity: z.number().int().min(1),
  email: z.string().email(),
});

const CORRELATED = { headers: { "X-Correlation-Id": "c-1" } };

const run = async (handler: Handler, path: string, init?: RequestInit) => {
  const call = makeCall(path, init);
  const res = await handler(call.req, call.ctx);
  return { res, logger: call.logger };
};

const echoParams = createHandler({
  params: ItemParams,
  action: ({ params }) => reply.ok(params),
});

describe("params stage", () => {
  it("binds defaults and headers", async () => {
    const { res } = await run(echoParams, "/items", CORRELATED);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/json; charset=utf-8");
    expect(await res.json()).toEqual({ page: 1, correlationId: "c-1" });
  });

  it("reports a value that does not convert", async () => {
    const { res } = await run(echoParams, "/items?page=invalid", CORRELATED);

    expect(res.status).toBe(400);
    expect(res.headers.get("content-type")).toBe("application/problem+json; charset=utf-8");
    expect(await res.json()).toEqual({
      type: "/problems/bad-parameters.md",
      title: "Bad Parameters",
      detail: "The request parameters are invalid or malformed",
      status: 400,
      code: "400-02",
      instance: "/items",
      violations: [{ parameter: "page", detail: "must be a valid int", type: "query" }],
    });
  });

  it("reports a missing required header", async () => {
    const { res } = await run(echoParams, "/items");

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      violations: [
        { parameter: "X-Correlation-Id", detail: "X-Correlation-Id is required", type: "header" },
      ],
    });
  });

  it("answers 500 and logs a malformed default", async () => {
    const action = vi.fn(() => reply.ok("never"));
    const handler = createHandler({
      params: defineParams(z.object({ count: z.number().int() }), {
        count: "query=count,default=ten",
      }),
      action,
    });

    const { res, logger } = await run(handler, "/items");

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({
      code: "500-01",
      detail: "The server encountered an unexpected internal error",
    });
    expect(logger.messages("warn")).toEqual(["Handler failed to decode params data"]);
    expect(action).not.toHaveBeenCalled();
  });
});

describe("body stage", () => {
  const echoBody = createHandler({
    body: NestedBody,
    action: async ({ data, request }) => reply.ok({ data, raw: await request.text() }),
  });

  it("rejects an empty body", async () => {
    const { res } = await run(echoBody, "/things", { method: "POST" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      type: "/problems/bad-request.md",
      title: "Bad Request",
      detail: EMPTY_BODY_DETAIL,
      status: 400,
      code: "400-01",
      instance: "/things",
    });
  });

  it("rejects malformed JSON and logs it", async () => {
    const { res, logger } = await run(echoBody, "/things", { method: "POST", body: "{" });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ detail: "The request is invalid or malformed" });
    expect(logger.messages("warn")).toEqual(["Handler failed to decode request data"]);
  });

  it("points at nested constraint violations", async () => {
    const { res } = await run(echoBody, "/things", jsonBody({}));

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      type: "/problems/constraint-violation.md",
      title: "Constraint Violation",
      detail: "The request data violated one or more validation constraints",
      status: 422,
      code: "422-02",
      instance: "/things",
      violations: [{ detail: "thing is required", pointer: "/inner/thing" }],
    });
  });

  it("reports a missing nested object at its own pointer", async () => {
    const handler = createHandler({
      body: z.object({ inner: z.object({ thing: required(z.string()) }) }),
      action: ({ data }) => reply.ok(data),
    });
    const { res } = await run(handler, "/things", jsonBody({}));

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      violations: [{ detail: "inner is required", pointer: "/inner" }],
    });
  });

  it("lists every violation", async () => {
    const handler = createHandler({ body: OrderBody, action: ({ data }) => reply.created(data) });
    const { res } = await run(handler, "/orders", jsonBody({ quantity: 0, email: "x" }));

    expect(await res.json()).toMatchObject({
      violations: [
        { detail: "item is required", pointer: "/item" },
        { detail: "quantity should be min=1", pointer: "/quantity" },
        { detail: "email should be a valid email", pointer: "/email" },
      ],
    });
  });

  it("leaves the body readable for the action", async () => {
    const raw = '{"inner":{"thing":"ok"}}';
    const { res } = await run(echoBody, "/things", { method: "POST", body: raw });

    expect(await res.json()).toEqual({ data: { inner: { thing: "ok" } }, raw });
  });

  it("answers 500 when the body cannot be read", async () => {
    const call = makeCall("/things", jsonBody({ inner: { thing: "ok" } }));
    await call.req.text();

    const res = await echoBody(call.req, call.ctx);

    expect(res.status).toBe(500);
    expect(call.logger.messages("warn")).toEqual(["Handler failed to read request body"]);
  });
});

class Greeting {
  constructor(public name: string) {}

  transform(): void {
    this.name = this.name.trim();
  }
}

class Shout {
  constructor(public text: string) {}

  transform(): void {
    if (this.text === "") throw new Error("nothing to shout");
    this.text = this.text.toUpperCase();
  }
}

describe("transform stage", () => {
  it("runs hooks and transform methods before the action", async () => {
    const handler = createHandler({
      params: ItemParams,
      body: z.object({ name: z.string() }).transform((v) => new Greeting(v.name)),
      transformParams: (params) => ({ ...params, page: params.page * 10 }),
      action: ({ params, data }) => reply.ok({ page: params.page, name: data.name }),
    });

    const { res } = await run(handler, "/greet?page=2", {
      method: "POST",
      headers: { "X-Correlation-Id": "c-1" },
      body: '{"name":"  Ada  "}',
    });

    expect(await res.json()).toEqual({ page: 20, name: "Ada" });
  });

  it("answers 500 when a params hook fails", async () => {
    const action = vi.fn(() => reply.ok("never"));
    const handler = createHandler({
      params: ItemParams,
      transformParams: () => {
        throw new Error("hook failed");
      },
      action,
    });

    const { res, logger } = await run(handler, "/items", CORRELATED);

    expect(res.status).toBe(500);
    expect(logger.records.find((r) => r.level === "warn")).toEqual({
      level: "warn",
      msg: "Handler failed to transform params data",
      meta: { requestId: "req-1", layer: "handler", error: "hook failed" },
    });
    expect(action).not.toHaveBeenCalled();
  });

  it("answers 500 when a data hook fails", async () => {
    const handler = createHandler({
      body: NestedBody,
      transformData: () => Promise.reject(new Error("hook failed")),
      action: () => reply.ok("never"),
    });

    const { res, logger } = await run(handler, "/things", jsonBody({ inner: { thing: "ok" } }));

    expect(res.status).toBe(500);
    expect(logger.messages("warn")).toEqual(["Handler failed to transform request data"]);
  });
});

describe("action and response", () => {
  const answer = (action: Action<undefined, undefined>) =>
    run(createHandler({ action }), "/things");

  it("writes a created payload", async () => {
    const { res } = await answer(() => reply.created({ id: "o-1" }));

    expect(res.status).toBe(201);
    expect(res.headers.get("content-type")).toBe("application/json; charset=utf-8");
    expect(await res.json()).toEqual({ id: "o-1" });
  });

  it("answers 204 to a null reply", async () => {
    const { res } = await answer(() => ok(null));

    expect(res.status).toBe(204);
    expect(await res.text()).toBe("");
  });

  it("writes the status alone when there is no payload", async () => {
    const { res } = await answer(() => reply.status(202));

    expect(res.status).toBe(202);
    expect(res.headers.get("content-type")).toBeNull();
    expect(await res.text()).toBe("");
  });

  it("redirects", async () => {
    const { res } = await answer(() => reply.redirect(303, "/orders/1"));

    expect(res.status).toBe(303);
    expect(res.headers.get("location")).toBe("/orders/1");
  });

  it("treats an empty location as a plain reply", async () => {
    const { res } = await answer(() => ok({ status: 200, payload: { id: "o-1" }, location: "" }));

    expect(res.status).toBe(200);
    expect(res.headers.get("location")).toBeNull();
    expect(await res.json()).toEqual({ id: "o-1" });
  });

  it("keeps reply headers", async () => {
    const { res } = await answer(() =>
      ok(withHeader({ status: 200, payload: [] }, "X-Total", "0")),
    );

    expect(res.headers.get("x-total")).toBe("0");
    expect(await res.json()).toEqual([]);
  });

  it("transforms the payload before encoding it", async () => {
    const { res } = await answer(() => reply.ok(new Shout("hi")));

    expect(await res.json()).toEqual({ text: "HI" });
  });

  it("answers 500 when the payload transform fails", async () => {
    const { res, logger } = await answer(() => reply.ok(new Shout("")));

    expect(res.status).toBe(500);
    expect(logger.messages("warn")).toEqual(["Handler failed to transform response data"]);
  });

  it("answers 500 when the payload cannot be encoded", async () => {
    const { res, logger } = await answer(() => reply.ok({ total: 10n }));

    expect(res.status).toBe(500);
    expect(logger.messages("error")).toEqual(["Handler failed to encode response data"]);
  });

  it("refuses a status outside 200-599", async () => {
    const { res, logger } = await answer(() => reply.status(42, "odd"));

    expect(res.status).toBe(500);
    expect(logger.messages("error")).toEqual(["Handler received an unhandled error"]);
  });

  it("passes a problem through verbatim", async () => {
    const { res, logger } = await answer(({ request }) => err(forbidden(request)));

    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({
      code: "403-01",
      detail: "You do not have the necessary permissions to GET this resource",
    });
    expect(logger.records).toEqual([]);
  });

  it("hides an opaque error behind a generic problem", async () => {
    const { res, logger } = await answer(() => err(new Error("db down")));

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({
      detail: "The server encountered an unexpected internal error",
    });
    expect(logger.records).toEqual([
      {
        level: "error",
        msg: "Handler received an unhandled error",
        meta: { requestId: "req-1", layer: "handler", error: "db down" },
      },
    ]);
  });

  it("lets a throw win over a reply already built", async () => {
    const { res } = await answer(() => {
      const built = reply.ok({ fine: true });
      if (built.ok) throw new Error("late failure");
      return built;
    });

    expect(res.status).toBe(500);
  });

  it("builds problems on the configured base", async () => {
    const handler = createHandler({
      problems: createProblemFactory("https://docs.test/problems/"),
      params: ItemParams,
      action: ({ params }) => reply.ok(params),
    });

    const { res } = await run(handler, "/items");

    expect(await res.json()).toMatchObject({
      type: "https://docs.test/problems/bad-parameters.md",
    });
  });
});

describe("guard stage", () => {
  it("passes the original request on a null decision", async () => {
    const handler = createHandler({
      guard: () => ok(null),
      action: ({ request }) => reply.ok({ trace: request.headers.get("X-Trace") }),
    });

    const { res } = await run(handler, "/things", { headers: { "X-Trace": "t-1" } });

    expect(await res.json()).toEqual({ trace: "t-1" });
  });

  it("binds params from the request a guard hands over", async () => {
    const handler = createHandler({
      params: ItemParams,
      guard: (req) =>
        proceedWith({
          request: new Request(req.url, { headers: { "X-Correlation-Id": "from-guard" } }),
          locals: { user: "u-1" },
        }),
      action: ({ params, ctx }) => reply.ok({ params, user: ctx.locals["user"] }),
    });

    const { res } = await run(handler, "/items?page=3");

    expect(await res.json()).toEqual({
      params: { page: 3, correlationId: "from-guard" },
      user: "u-1",
    });
  });

  it("answers a halt without running the action", async () => {
    const action = vi.fn(() => reply.ok("never"));
    const handler = createHandler({
      guard: () => halt({ status: 202, payload: { queued: true } }),
      action,
    });

    const { res } = await run(handler, "/things");

    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({ queued: true });
    expect(action).not.toHaveBeenCalled();
  });

  it("answers a guard's problem before binding params", async () => {
    const handler = createHandler({
      params: ItemParams,
      guard: (req) => err(forbidden(req)),
      action: ({ params }) => reply.ok(params),
    });

    const { res } = await run(handler, "/items?page=invalid");

    expect(res.status).toBe(403);
  });
});
