import { describe, expect, it } from 'vitest';
import { readBody } from './body.js';

function respond(body: string | null, status = 200, contentType: string | null = 'application/json'): Response {
  if (contentType === null) {
    // A string body would get text/plain added; bytes go out without a content type
    return new Response(body === null ? null : new TextEncoder().encode(body), { status });
  }

  return new Response(body, { status, headers: { 'Content-Type': contentType } });
}

describe('readBody', () => {
  it('parses a JSON body', async () => {
    const [err, value] = await readBody(respond('{"accessToken":"access-1"}'));

    expect(err).toBeNull();
    expect(value).toStrictEqual({ accessToken: 'access-1' });
  });

  it('accepts media type parameters and +json types', async () => {
    const [, charset] = await readBody(respond('[1,2]', 200, 'application/json; charset=utf-8'));
    const [, problem] = await readBody(respond('{"title":"Bad Request"}', 400, 'application/problem+json'));

    expect(charset).toStrictEqual([1, 2]);
    expect(problem).toStrictEqual({ title: 'Bad Request' });
  });

  it.each([204, 205])('returns null for a %i', async (status) => {
    const [err, value] = await readBody(respond(null, status));

    expect(err).toBeNull();
    expect(value).toBeNull();
  });

  it('returns null for an empty or blank body', async () => {
    const [, empty] = await readBody(respond(''));
    const [, blank] = await readBody(respond('  \n'));

    expect(empty).toBeNull();
    expect(blank).toBeNull();
  });

  it('returns the text of a non-JSON media type', async () => {
    const [err, value] = await readBody(respond('{"looks":"like json"}', 401, 'text/plain'));

    expect(err).toBeNull();
    expect(value).toBe('{"looks":"like json"}');
  });

  it('decodes JSON when the content type is missing, else keeps the text', async () => {
    const [, json] = await readBody(respond('{"message":"Unauthorized"}', 401, null));
    const [, text] = await readBody(respond('Bad Gateway', 502, null));

    expect(json).toStrictEqual({ message: 'Unauthorized' });
    expect(text).toBe('Bad Gateway');
  });

  it('fails on malformed JSON', async () => {
    const [err, value] = await readBody(respond('{"accessToken":'));

    expect(value).toBeNull();
    expect(err?.message).toBe('error parsing json body of 200 response');
    expect(err?.cause).toBeInstanceOf(SyntaxError);
  });

  it('fails when the body was already consumed', async () => {
    const response = respond('{"ok":true}');
    await response.text();

    const [err, value] = await readBody(response);

    expect(value).toBeNull();
    expect(err?.message).toBe('error reading body of 200 response');
  });
});
