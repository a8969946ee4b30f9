import { ValidationError } from '../errors';
import { TaggedUnionSchema } from '../protocol/schema';

export const FRAME_DELIMITER = '\n';

/**
 * One value, one line. JSON.stringify escapes newlines inside strings, so
 * the only raw newline is the delimiter.
 */
export function encodeFrame<T extends { type: string }>(value: T): string {
  return `${JSON.stringify(value)}${FRAME_DELIMITER}`;
}

export function decodeFrame<T extends { type: string }>(line: string, schema: TaggedUnionSchema<T>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new ValidationError(error instanceof Error ? error.message : 'malformed JSON');
  }
  return schema.validate(parsed);
}

/**
 * Splits a text stream on the frame delimiter only. A carriage return is
 * ordinary JSON whitespace and never ends a frame. A trailing line without
 * a delimiter is still yielded at end of stream.
 */
export async function* readLines(input: AsyncIterable<string | Buffer>): AsyncGenerator<string> {
  let pending = '';
  for await (const chunk of input) {
    pending += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    let index = pending.indexOf(FRAME_DELIMITER);
    while (index !== -1) {
      yield pending.slice(0, index);
      pending = pending.slice(index + FRAME_DELIMITER.length);
      index = pending.indexOf(FRAME_DELIMITER);
    }
  }
  if (pending.length > 0) {
    yield pending;
  }
}
