/**
 * JSON codec for wire messages
 */

import { WireMessageSchema, type WireMessage } from './schemas';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encodeMessage(message: WireMessage): Uint8Array {
  return encoder.encode(JSON.stringify(message));
}

/**
 * Decode a payload. Returns null for anything that is not valid JSON or
 * not a known, well-formed message.
 */
export function decodeMessage(payload: Uint8Array | string): WireMessage | null {
  const text = typeof payload === 'string' ? payload : decoder.decode(payload);

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }

  const result = WireMessageSchema.safeParse(json);
  return result.success ? result.data : null;
}
