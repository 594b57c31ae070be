export {
  type ContextOptions,
  type Handler,
  type Middleware,
  type RequestContext,
  createRequestContext,
  withLocals,
  withPathParams,
} from "./context.js";
export {
  type Reply,
  isRedirect,
  newReply,
  redirectReply,
  reply,
  withHeader,
} from "./reply.js";
export {
  type Responder,
  type ResponderOptions,
  type Transformable,
  createResponder,
  failureResponse,
  isTransformable,
  problemResponse,
  writeReply,
} from "./respond.js";
export {
  type Guard,
  type GuardDecision,
  type GuardOutcome,
  type GuardResult,
  guardStack,
  guarded,
  halt,
  proceed,
  proceedWith,
  runGuard,
} from "./guard.js";
export {
  type Action,
  type ActionResult,
  type HandlerOptions,
  type HydratedRequest,
  type TransformHook,
  EMPTY_BODY_DETAIL,
  createHandler,
} from "./handler.js";
export { type Endpoint, type EndpointGroup, endpoint, group, withGuard } from "./endpoint.js";
export * from "./routes/index.js";
export * from "./middleware/index.js";
export {
  type BearerGuardOptions,
  type TokenVerifier,
  PRINCIPAL_KEY,
  bearerGuard,
  staticTokenVerifier,
} from "./guards/bearer.js";
export {
  type RateLimitKey,
  RATE_LIMIT_KEY,
  forwardedFor,
  rateLimitGuard,
} from "./guards/rate-limit.js";
export {
  type NodeRequestLike,
  type NodeResponseLike,
  type RunningServer,
  type ServerOptions,
  PayloadTooLargeError,
  createRequestListener,
  createServer,
  readBody,
  toRequest,
  writeResponse,
} from "./server.js";
