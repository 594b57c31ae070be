import { createProblemFactory } from "./core/errors/problem.js";
import { loadServerConfig } from "./infrastructure/config/config.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { createFixedWindowRateLimiter } from "./infrastructure/rate-limit/fixed-window.js";
import { createInMemoryOrderStore } from "./example/order-store.js";
import { orderEndpoints } from "./example/orders.handler.js";
import { guardStack } from "./presentation/guard.js";
import { bearerGuard, staticTokenVerifier } from "./presentation/guards/bearer.js";
import { rateLimitGuard } from "./presentation/guards/rate-limit.js";
import { securityHeaders } from "./presentation/middleware/security-headers.js";
import { createRouter } from "./presentation/routes/router.js";
import { createServer } from "./presentation/server.js";
import { printConfigError } from "./shared/cli.js";

/**
 * Demo server: the orders API behind rate limiting, bearer auth on writes
 * and the security headers.
 */
const bootstrap = async (): Promise<void> => {
  // 1. Config: fail fast
  const loaded = loadServerConfig(process.env);
  if (!loaded.ok) {
    printConfigError(loaded.error);
    process.exit(1);
  }
  const config = loaded.value;

  // 2. Logger
  const logger = createLogger({ level: config.log.level, format: config.log.format });

  // 3. Routes
  const problems = createProblemFactory(config.problems.typeBase);
  const limiter = createFixedWindowRateLimiter({ windowMs: 60_000, maxRequests: 100 });
  const token = process.env["API_TOKEN"] ?? "dev-token";

  const router = createRouter({ logger, problems });
  router.register(
    orderEndpoints({
      store: createInMemoryOrderStore(),
      guard: guardStack(
        rateLimitGuard(limiter, undefined, problems),
        bearerGuard(staticTokenVerifier(token, { subject: "api-client" }), { problems }),
      ),
      problems,
    }).withMiddleware(securityHeaders()),
  );

  // 4. Server
  const server = createServer({
    config: config.server,
    logger,
    router,
    problems,
    logFormat: config.log.format,
  });
  await server.listen();

  // 5. Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info("Shutting down", { signal });
    server.stop().then(
      () => process.exit(0),
      (e: unknown) => {
        logger.fatal("Shutdown failed", { error: e instanceof Error ? e.message : String(e) });
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  process.on("unhandledRejection", (reason) => {
    logger.fatal("Unhandled promise rejection", {
      error: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });
};

bootstrap().catch((e: unknown) => {
  process.stderr.write(`${e instanceof Error ? (e.stack ?? e.message) : String(e)}\n`);
  process.exit(1);
});
