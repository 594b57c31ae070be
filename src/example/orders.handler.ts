import { z } from "zod";
import { type ProblemFactory, problems as defaultProblems } from "../core/errors/problem.js";
import { defineParams } from "../core/params/definition.js";
import { err, ok } from "../core/types/result.js";
import { required } from "../infrastructure/validation/rules.js";
import { type Endpoint, type EndpointGroup, endpoint, group } from "../presentation/endpoint.js";
import type { Guard } from "../presentation/guard.js";
import { createHandler } from "../presentation/handler.js";
import { reply } from "../presentation/reply.js";
import type { OrderStore } from "./order-store.js";

export const ListOrdersParams = defineParams(
  z.object({
    page: z.number().int().min(1),
    limit: z.number().int().min(1).max(100),
    sort: z.enum(["asc", "desc"]),
    correlationId: required(z.string()),
  }),
  {
    page: "query=page,default=1",
    limit: "query=limit,default=20",
    sort: "query=sort,default=asc",
    correlationId: "header=X-Correlation-Id",
  },
);

export const OrderIdParams = defineParams(z.object({ id: z.string().uuid() }), {
  id: "path=id",
});

export const PlaceOrderBody = z.object({
  item: required(z.string()),
  quantity: z.number().int().min(1).max(50),
  email: z.string().email(),
});

export interface OrderEndpointDeps {
  readonly store: OrderStore;
  /** Guards the mutating routes */
  readonly guard: Guard;
  readonly problems?: ProblemFactory | undefined;
}

/**
 * Orders API:
 *
 *   GET    /orders        list, paginated
 *   GET    /orders/{id}   one order
 *   POST   /orders        place an order
 *   DELETE /orders/{id}   cancel an order
 */
export const orderEndpoints = (deps: OrderEndpointDeps): EndpointGroup => {
  const { store } = deps;
  const problems = deps.problems ?? defaultProblems;

  const list = createHandler({
    problems,
    params: ListOrdersParams,
    action: ({ params }) => reply.ok(store.list(params.page, params.limit, params.sort)),
  });

  const get = createHandler({
    problems,
    params: OrderIdParams,
    action: ({ params, request }) => {
      const order = store.find(params.id);
      return order === undefined ? err(problems.notFound(request)) : reply.ok(order);
    },
  });

  const place = createHandler({
    problems,
    body: PlaceOrderBody,
    action: ({ data }) => reply.created(store.place(data)),
  });

  const cancel = createHandler({
    problems,
    params: OrderIdParams,
    action: ({ params, request }) =>
      store.remove(params.id) ? ok(null) : err(problems.notFound(request)),
  });

  const mutating: readonly Endpoint[] = group(
    endpoint("POST", "/orders", place),
    endpoint("DELETE", "/orders/{id}", cancel),
  ).withGuard(deps.guard).endpoints;

  return group(endpoint("GET", "/orders", list), endpoint("GET", "/orders/{id}", get), ...mutating);
};
