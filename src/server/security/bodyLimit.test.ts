import { describe, expect, it } from 'vitest';

import { readJsonBody } from './bodyLimit';

function requestWith(body: string | null, headers: Record<string, string> = {}) {
  return {
    headers: new Headers(headers),
    body: body === null ? null : new Response(body).body,
  };
}

describe('readJsonBody', () => {
  it('parses a body within the limit', async () => {
    await expect(readJsonBody(requestWith('{"session_id":"s"}'), { maxBytes: 1024 })).resolves.toEqual({ session_id: 's' });
  });

  it('rejects a declared length over the limit before reading', async () => {
    const req = requestWith('{}', { 'content-length': '4096' });
    await expect(readJsonBody(req, { maxBytes: 1024 })).rejects.toMatchObject({ status: 413, code: 'payload_too_large' });
  });

  it('rejects a streamed body over the limit', async () => {
    await expect(readJsonBody(requestWith('x'.repeat(64)), { maxBytes: 16 })).rejects.toMatchObject({ status: 413 });
  });

  it('distinguishes a missing body from malformed JSON', async () => {
    await expect(readJsonBody(requestWith(null), { maxBytes: 1024 })).rejects.toMatchObject({ status: 400, code: 'missing_json_body' });
    await expect(readJsonBody(requestWith('{oops'), { maxBytes: 1024 })).rejects.toMatchObject({ status: 400, code: 'invalid_json' });
  });

  it('returns undefined for an empty optional body', async () => {
    await expect(readJsonBody(requestWith('  '), { maxBytes: 1024, optional: true })).resolves.toBeUndefined();
  });
});
