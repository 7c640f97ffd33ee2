import { describe, expect, it } from 'vitest';
import { readBody } from './readBody.js';

describe('readBody', () => {
  it('returns the body text', async () => {
    const [err, body] = await readBody(new Response('{"id":"ch_1"}', { status: 200 }));

    expect(err).toBeNull();
    expect(body).toBe('{"id":"ch_1"}');
  });

  it('returns an empty string for 204 responses', async () => {
    const [err, body] = await readBody(new Response(null, { status: 204 }));

    expect(err).toBeNull();
    expect(body).toBe('');
  });

  it('wraps failures to read the stream', async () => {
    const response = new Response('already read');
    await response.text();

    const [err, body] = await readBody(response);

    expect(body).toBeNull();
    expect(err?.message).toBe('error reading response body');
    expect(err?.cause).toBeInstanceOf(TypeError);
  });
});
