import type { Result } from "../types/result.js";

/**
 * Port ServerCodec. Turns request bytes into values and reply payloads
 * into bytes. Decoding never throws; a malformed body is an `err`.
 */
export interface ServerCodec {
  /** Content-Type written alongside encoded payloads */
  readonly contentType: string;
  /** Content-Type written alongside encoded problem documents */
  readonly problemContentType: string;
  decode(body: Uint8Array): Result<unknown, Error>;
  encode(data: unknown): Result<string, Error>;
}
