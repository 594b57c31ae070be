import type { ServerCodec } from "../../core/ports/codec.js";
import { err, ok, type Result } from "../../core/types/result.js";

const toError = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));

/**
 * JSON ServerCodec. Bodies must be UTF-8; a byte order mark is rejected the
 * same way any other malformed document is.
 */
export const createJsonCodec = (): ServerCodec => {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

  return {
    contentType: "application/json; charset=utf-8",
    problemContentType: "application/problem+json; charset=utf-8",

    decode(body: Uint8Array): Result<unknown, Error> {
      try {
        const parsed: unknown = JSON.parse(decoder.decode(body));
        return ok(parsed);
      } catch (e: unknown) {
        return err(toError(e));
      }
    },

    encode(data: unknown): Result<string, Error> {
      try {
        const text = JSON.stringify(data);
        if (text === undefined) return err(new Error(`cannot encode ${typeof data} as JSON`));
        return ok(text);
      } catch (e: unknown) {
        return err(toError(e));
      }
    },
  };
};
