import { ok, type Ok } from "../core/types/result.js";

/**
 * What an action answers with. `payload: undefined` writes the status alone;
 * a `location` turns the reply into a redirect.
 */
export interface Reply<T = unknown> {
  readonly status: number;
  readonly payload?: T | undefined;
  readonly location?: string | undefined;
  readonly headers?: Readonly<Record<string, string>> | undefined;
}

export const newReply = <T>(status: number, payload?: T): Reply<T> => ({ status, payload });

export const redirectReply = (status: number, location: string): Reply<never> => ({
  status,
  location,
});

export const isRedirect = <T>(r: Reply<T>): r is Reply<T> & { readonly location: string } =>
  r.location !== undefined && r.location !== "";

/** Copy of `r` with one header added. */
export const withHeader = <T>(r: Reply<T>, name: string, value: string): Reply<T> => ({
  ...r,
  headers: { ...r.headers, [name]: value },
});

/**
 * Shorthands for actions: each resolves to `ok(Reply)`.
 *
 * @example
 * const action = async ({ data }) => reply.created(await orders.place(data));
 */
export const reply = {
  ok: <T>(payload: T): Ok<Reply<T>> => ok(newReply(200, payload)),
  created: <T>(payload: T): Ok<Reply<T>> => ok(newReply(201, payload)),
  accepted: <T>(payload: T): Ok<Reply<T>> => ok(newReply(202, payload)),
  noContent: (): Ok<Reply<never>> => ok({ status: 204 }),
  status: <T>(status: number, payload?: T): Ok<Reply<T>> => ok(newReply(status, payload)),
  redirect: (status: number, location: string): Ok<Reply<never>> =>
    ok(redirectReply(status, location)),
} as const;
