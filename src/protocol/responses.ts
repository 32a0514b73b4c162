/**
 * Reply line decoding.
 */

import { MalformedReplyError } from '../exceptions';
import type { ReplySpec, ReplyType, ReplyValueMap } from '../models/command';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const REAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Cast reply text to the target type.
 *
 * Numeric casts ignore surrounding whitespace.
 *
 * @throws {MalformedReplyError} If the text is not a valid value of the type
 */
export function castReply<T extends ReplyType>(
  text: string,
  type: T
): ReplyValueMap[T];
export function castReply(text: string, type: ReplyType): string | number {
  if (type === 'string') {
    return text;
  }

  const trimmed = text.trim();
  const pattern = type === 'integer' ? INTEGER_PATTERN : REAL_PATTERN;
  if (!pattern.test(trimmed)) {
    throw new MalformedReplyError(
      `Cannot parse "${text}" as ${type}`
    );
  }
  return Number(trimmed);
}

/**
 * Take the substring `[start, end)` of a reply line and cast it.
 *
 * @param raw - Reply line without its terminator
 * @param start - Offset of the first character
 * @param end - Offset past the last character (default: end of line)
 * @param type - Target type
 * @throws {MalformedReplyError} If the offsets fall outside the line or the
 *   cast fails
 */
export function sliceAndCast<T extends ReplyType>(
  raw: string,
  start: number,
  end: number | undefined,
  type: T
): ReplyValueMap[T] {
  const stop = end ?? raw.length;
  if (start < 0 || start > raw.length || stop < start || stop > raw.length) {
    throw new MalformedReplyError(
      `Reply "${raw}" too short for slice [${start}, ${end ?? ''})`
    );
  }
  return castReply(raw.slice(start, stop), type);
}

/**
 * Decode a reply line according to a command's reply spec.
 *
 * @param raw - Reply line without its terminator
 * @param reply - Reply spec of the command that was sent
 * @returns Typed value
 * @throws {MalformedReplyError} If the slice or the cast fails
 */
export function decodeReply<T extends ReplyType>(
  raw: string,
  reply: ReplySpec<T>
): ReplyValueMap[T] {
  if (reply.slice) {
    return sliceAndCast(raw, reply.slice.start, reply.slice.end, reply.type);
  }
  return castReply(raw, reply.type);
}
