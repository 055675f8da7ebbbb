/**
 * Wire codec: one UTF-8 JSON object per datagram
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { KEY_ERROR, KEY_RESULT, MAX_DATAGRAM_SIZE } from '../constants.js';
import type { Message } from '../types/udp.js';

const errorObjectSchema = z
  .object({
    code: z.number().int().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export type ErrorObject = z.infer<typeof errorObjectSchema>;

const objectSchema = z.record(z.unknown());

export type DecodedDatagram =
  | { kind: 'result'; data: Record<string, unknown>; text: string }
  | { kind: 'error'; data: Record<string, unknown>; error: ErrorObject; text: string }
  | { kind: 'invalid'; text: string; cause: unknown };

/**
 * Serialize a message once; the buffer is reused for every attempt
 */
export function encodeMessage(message: Message): Buffer {
  const payload = Buffer.from(JSON.stringify(message), 'utf8');
  if (payload.length > MAX_DATAGRAM_SIZE) {
    throw new ValidationError(
      `Message size ${payload.length} exceeds maximum ${MAX_DATAGRAM_SIZE} bytes`,
      { field: 'message', value: payload.length }
    );
  }
  return payload;
}

/**
 * Classify an inbound datagram.
 * Anything that is not a top-level JSON object is `invalid`.
 * An `error` key that is not an object still counts as an error reply.
 */
export function decodeDatagram(msg: Buffer): DecodedDatagram {
  const text = msg.toString('utf8');

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (cause) {
    return { kind: 'invalid', text, cause };
  }

  const parsed = objectSchema.safeParse(json);
  if (!parsed.success) {
    return { kind: 'invalid', text, cause: new Error('Reply is not a JSON object') };
  }

  const data = parsed.data;
  if (!(KEY_ERROR in data)) {
    return { kind: 'result', data, text };
  }

  const error = errorObjectSchema.safeParse(data[KEY_ERROR]);
  return {
    kind: 'error',
    data,
    error: error.success ? error.data : {},
    text,
  };
}

/**
 * `result` object of a reply, or the reply itself when the device left it out
 */
export function resultOf(data: Record<string, unknown>): Record<string, unknown> {
  const result = objectSchema.safeParse(data[KEY_RESULT]);
  return result.success ? result.data : data;
}
