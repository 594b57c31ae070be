export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  map,
  mapErr,
  settle,
  tryCatchAsync,
} from "./result.js";
