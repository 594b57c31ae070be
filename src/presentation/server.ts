import {
  createServer as createHttpServer,
  type IncomingHttpHeaders,
  type Server,
} from "node:http";
import type { AddressInfo } from "node:net";
import { describeCause } from "../core/errors/failure.js";
import type { Logger } from "../core/ports/logger.js";
import { err, ok, type Result } from "../core/types/result.js";
import type { ServerConfig } from "../infrastructure/config/config.js";
import type { LogFormat } from "../infrastructure/logging/logger.js";
import { formatAccessLog } from "../shared/log-format.js";
import { createRequestContext } from "./context.js";
import { createResponder, problemResponse, type ResponderOptions } from "./respond.js";
import type { Router } from "./routes/router.js";

/** The parts of a node:http IncomingMessage the adapter reads. */
export interface NodeRequestLike extends AsyncIterable<Uint8Array | string> {
  readonly method?: string | undefined;
  readonly url?: string | undefined;
  readonly headers: IncomingHttpHeaders;
  readonly socket: { readonly remoteAddress?: string | undefined };
}

/** The parts of a node:http ServerResponse the adapter writes. */
export interface NodeResponseLike {
  writeHead(statusCode: number, headers: Record<string, string | string[]>): unknown;
  end(chunk?: Uint8Array): unknown;
}

export interface ServerOptions extends ResponderOptions {
  readonly config: ServerConfig["server"];
  readonly logger: Logger;
  readonly router: Router;
  /** Access log style; pretty lines go straight to stdout */
  readonly logFormat?: LogFormat | undefined;
  /** Set false to skip access logs */
  readonly accessLog?: boolean | undefined;
}

export class PayloadTooLargeError extends Error {
  override readonly name = "PayloadTooLargeError";

  constructor(readonly limit: number) {
    super(`request body exceeds ${limit} bytes`);
  }
}

const encoder = new TextEncoder();

/** Buffer a request body, giving up as soon as it passes `limit` bytes. */
export const readBody = async (
  source: AsyncIterable<Uint8Array | string>,
  limit: number,
): Promise<Result<Uint8Array, PayloadTooLargeError>> => {
  const chunks: Uint8Array[] = [];
  let size = 0;

  for await (const chunk of source) {
    const bytes = typeof chunk === "string" ? encoder.encode(chunk) : chunk;
    size += bytes.byteLength;
    if (size > limit) return err(new PayloadTooLargeError(limit));
    chunks.push(bytes);
  }

  const body = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return ok(body);
};

const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

/** Build a fetch Request from a node:http request and its buffered body. */
export const toRequest = (req: NodeRequestLike, body: Uint8Array, origin: string): Request => {
  const method = (req.method ?? "GET").toUpperCase();
  const headers = new Headers();

  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(name, v);
    } else {
      headers.set(name, value);
    }
  }

  return new Request(new URL(req.url ?? "/", origin), {
    method,
    headers,
    body: BODYLESS_METHODS.has(method) || body.byteLength === 0 ? null : body,
  });
};

/**
 * Copy a fetch Response onto a node:http response. `defaults` fill in
 * headers the response does not set itself.
 */
export const writeResponse = async (
  res: NodeResponseLike,
  response: Response,
  defaults: Readonly<Record<string, string>> = {},
): Promise<void> => {
  const headers: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(defaults)) {
    if (!response.headers.has(name)) headers[name.toLowerCase()] = value;
  }
  response.headers.forEach((value, name) => {
    if (name !== "set-cookie") headers[name] = value;
  });
  const cookies = response.headers.getSetCookie();
  if (cookies.length > 0) headers["set-cookie"] = cookies;

  const body = new Uint8Array(await response.arrayBuffer());
  res.writeHead(response.status, headers);
  res.end(body.byteLength > 0 ? body : undefined);
};

const contentLength = (headers: IncomingHttpHeaders): number => {
  const raw = headers["content-length"];
  if (raw === undefined) return 0;
  const n = Number(raw);
  return Number.isFinite(n) ? n : 0;
};

/**
 * node:http listener: buffers the body, builds a fetch Request, lets the
 * router answer it and writes the access log.
 */
export const createRequestListener = (options: ServerOptions) => {
  const { config, router } = options;
  const logger = options.logger.child({ layer: "server" });
  const deps = createResponder(options);
  const origin = `http://${config.host}:${config.port}`;
  const accessLog = options.accessLog ?? true;
  const pretty = (options.logFormat ?? "pretty") === "pretty";

  const tooLarge = (req: NodeRequestLike): Response => {
    logger.warn("Request body exceeds max bytes limit", { maxBytes: config.maxBodySize });
    const target = { method: req.method ?? "GET", url: new URL(req.url ?? "/", origin).href };
    return problemResponse(deps.problems.payloadTooLarge(target), deps.codec);
  };

  const respond = async (req: NodeRequestLike, res: NodeResponseLike): Promise<void> => {
    if (contentLength(req.headers) > config.maxBodySize) return writeResponse(res, tooLarge(req));

    const body = await readBody(req, config.maxBodySize);
    if (!body.ok) return writeResponse(res, tooLarge(req));

    const request = toRequest(req, body.value, origin);
    const ctx = createRequestContext(request, { logger: options.logger });
    const response = await router.handle(request, ctx);

    if (accessLog) {
      const entry = {
        method: ctx.method,
        path: ctx.path,
        status: response.status,
        durationMs: Math.round((performance.now() - ctx.startTime) * 100) / 100,
        ip: req.socket.remoteAddress ?? "0",
        requestId: ctx.requestId,
      };
      if (pretty) process.stdout.write(formatAccessLog(entry));
      else logger.info("Request handled", { ...entry });
    }

    return writeResponse(res, response, { "X-Request-Id": ctx.requestId });
  };

  return async (req: NodeRequestLike, res: NodeResponseLike): Promise<void> => {
    try {
      await respond(req, res);
    } catch (e: unknown) {
      logger.error("Server failed to handle request", { error: describeCause(e) });
      res.writeHead(500, {});
      res.end();
    }
  };
};

export interface RunningServer {
  readonly server: Server;
  /** Resolves with the bound address once listening */
  listen(): Promise<AddressInfo>;
  /** Stops accepting connections; open ones get `shutdownTimeoutMs` to finish */
  stop(): Promise<void>;
}

export const createServer = (options: ServerOptions): RunningServer => {
  const { config } = options;
  const logger = options.logger.child({ layer: "server" });
  const listener = createRequestListener(options);

  const server = createHttpServer((req, res) => {
    listener(req, res).catch((e: unknown) => {
      logger.error("Server failed to write response", { error: describeCause(e) });
    });
  });

  return {
    server,

    listen: () =>
      new Promise<AddressInfo>((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.port, config.host, () => {
          server.off("error", reject);
          const address = server.address();
          if (address === null || typeof address === "string") {
            reject(new Error(`unexpected server address ${String(address)}`));
            return;
          }
          logger.info("Server started", { address: `${address.address}:${address.port}` });
          resolve(address);
        });
      }),

    stop: () =>
      new Promise<void>((resolve, reject) => {
        const timer = setTimeout(() => {
          logger.warn("Server shutdown timed out, closing open connections", {
            timeoutMs: config.shutdownTimeoutMs,
          });
          server.closeAllConnections();
        }, config.shutdownTimeoutMs);
        timer.unref();

        server.close((e) => {
          clearTimeout(timer);
          if (e) {
            logger.error("Server failed to shutdown gracefully", { error: e.message });
            reject(e);
            return;
          }
          logger.info("Server shutdown");
          resolve();
        });
        server.closeIdleConnections();
      }),
  };
};
