// src/server/security/bodyLimit.ts

import { SyncError } from '~/server/sync/syncErrors';

export type BodyRequest = Pick<Request, 'headers' | 'body'>;

export interface ReadJsonBodyOptions {
  maxBytes: number;

  /**
   * Empty body => undefined instead of 400 `missing_json_body`.
   */
  optional?: boolean;
}

const payloadTooLarge = () => new SyncError(413, 'payload_too_large');

/**
 * Decode a body stream, cancelling it as soon as it crosses maxBytes.
 */
async function readTextCapped(body: ReadableStream<Uint8Array>, maxBytes: number): Promise<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let received = 0;
  let text = '';

  try {
    for (;;) {
      const chunk = await reader.read();
      if (chunk.done) return text + decoder.decode();

      received += chunk.value.byteLength;
      if (received > maxBytes) {
        await reader.cancel();
        throw payloadTooLarge();
      }
      text += decoder.decode(chunk.value, { stream: true });
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Size-capped JSON body for the POST sync routes.
 * A declared Content-Length over the cap fails before any byte is read.
 */
export async function readJsonBody(req: BodyRequest, options: ReadJsonBodyOptions): Promise<unknown> {
  const declared = Number(req.headers.get('content-length') ?? NaN);
  if (Number.isFinite(declared) && declared > options.maxBytes) throw payloadTooLarge();

  const text = req.body ? await readTextCapped(req.body, options.maxBytes) : '';
  if (!text.trim()) {
    if (options.optional) return undefined;
    throw new SyncError(400, 'missing_json_body');
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new SyncError(400, 'invalid_json');
  }
}
