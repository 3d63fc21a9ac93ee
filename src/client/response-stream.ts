import { isErr, unwrapOk } from "option-t/plain_result";
import { parseResponse } from "../protocol/frameParser.ts";
import type { ResponseFrame } from "../protocol/types.ts";

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.length === 0) return b;
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}

/**
 * Async generator that consumes raw byte chunks and yields decoded response
 * frames while performing resynchronisation.
 *
 * Contract:
 *  - Yields only frames that `parseResponse` accepts
 *  - Discards one byte on an unknown opcode or malformed header and retries
 *  - Stops when upstream iterable ends (partial trailing data ignored)
 */
export async function* responseFrameStream(
  source: AsyncIterable<Uint8Array>,
): AsyncGenerator<ResponseFrame, void, unknown> {
  let buffer: Uint8Array = new Uint8Array(0);
  for await (const chunk of source) {
    buffer = concat(buffer, chunk);
    while (buffer.length > 0) {
      const parsed = parseResponse(buffer);
      if (isErr(parsed)) {
        buffer = buffer.subarray(1);
        continue;
      }
      const decoded = unwrapOk(parsed);
      if (!decoded.done) break;
      buffer = buffer.subarray(decoded.consumed);
      yield decoded.value;
    }
  }
}
