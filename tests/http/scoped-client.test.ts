import {
  ScopedHttpClient,
  USER_AGENT,
  authorityOf,
  scopeFor,
  shouldAttachCredential,
} from '../../src/http/scoped-client';
import { AcquisitionError } from '../../src/domain/errors';

interface SentRequest {
  url: string;
  method?: string;
  headers: Record<string, string>;
  redirect?: RequestInit['redirect'];
}

/** Fetch stand-in answering from a route table and recording what was sent. */
function fakeFetch(routes: Record<string, () => Response>) {
  const sent: SentRequest[] = [];
  const fetchFn = async (input: string, init?: RequestInit): Promise<Response> => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    sent.push({ url: input, method: init?.method, headers, redirect: init?.redirect });
    const route = routes[input];
    return route ? route() : new Response('missing', { status: 404 });
  };
  return { fetchFn, sent };
}

const redirectTo = (location: string, status = 302) => () => new Response(null, { status, headers: { location } });
const ok = (body = 'ok') => () => new Response(body, { status: 200 });

describe('credential scope helpers', () => {
  test('authority includes the port', () => {
    expect(authorityOf('http://127.0.0.1:8080/a')).toBe('127.0.0.1:8080');
    expect(authorityOf('https://Registry.Test/a')).toBe('registry.test');
  });

  test('scopeFor binds to the origin authority', () => {
    expect(scopeFor('https://registry.test', 'test-secret')).toEqual({ token: 'test-secret', host: 'registry.test' });
    expect(scopeFor('https://registry.test', undefined)).toBeUndefined();
    expect(scopeFor('https://registry.test', '')).toBeUndefined();
  });

  test('shouldAttachCredential only for the same authority', () => {
    const auth = { token: 'test-secret', host: 'registry.test' };
    expect(shouldAttachCredential('https://registry.test/api', auth)).toBe(true);
    expect(shouldAttachCredential('https://cdn.registry.test/file', auth)).toBe(false);
    expect(shouldAttachCredential('https://registry.test:8443/api', auth)).toBe(false);
    expect(shouldAttachCredential('https://registry.test/api', undefined)).toBe(false);
  });
});

describe('ScopedHttpClient', () => {
  const auth = { token: 'test-secret', host: 'registry.test' };

  test('sends the bearer token to the registry and never to the redirect target', async () => {
    const { fetchFn, sent } = fakeFetch({
      'https://registry.test/download/1': redirectTo('https://storage.test/blob?sig=1'),
      'https://storage.test/blob?sig=1': ok('bytes'),
    });
    const client = new ScopedHttpClient(fetchFn);

    const { response, finalUrl, hops } = await client.request('https://registry.test/download/1', { auth });

    expect(await response.text()).toBe('bytes');
    expect(finalUrl).toBe('https://storage.test/blob?sig=1');
    expect(hops).toEqual([
      { url: 'https://registry.test/download/1', status: 302, authorized: true },
      { url: 'https://storage.test/blob?sig=1', status: 200, authorized: false },
    ]);
    expect(sent[0].headers.authorization).toBe('Bearer test-secret');
    expect(sent[1].headers.authorization).toBeUndefined();
    expect(sent.every((r) => r.redirect === 'manual')).toBe(true);
  });

  test('re-attaches the token when a redirect comes back to the registry', async () => {
    const { fetchFn, sent } = fakeFetch({
      'https://registry.test/a': redirectTo('/b'),
      'https://registry.test/b': ok(),
    });
    await new ScopedHttpClient(fetchFn).request('https://registry.test/a', { auth });
    expect(sent.map((r) => r.headers.authorization)).toEqual(['Bearer test-secret', 'Bearer test-secret']);
  });

  test('sets the user agent and passes extra headers', async () => {
    const { fetchFn, sent } = fakeFetch({ 'https://storage.test/f': ok() });
    await new ScopedHttpClient(fetchFn).request('https://storage.test/f', { headers: { Range: 'bytes=0-0' } });
    expect(sent[0].headers['user-agent']).toBe(USER_AGENT);
    expect(sent[0].headers.range).toBe('bytes=0-0');
  });

  test('returns the redirect itself when not following', async () => {
    const { fetchFn, sent } = fakeFetch({ 'https://registry.test/a': redirectTo('https://storage.test/x') });
    const { response, finalUrl } = await new ScopedHttpClient(fetchFn).request('https://registry.test/a', {
      followRedirects: false,
    });
    expect(response.status).toBe(302);
    expect(response.headers.get('location')).toBe('https://storage.test/x');
    expect(finalUrl).toBe('https://registry.test/a');
    expect(sent).toHaveLength(1);
  });

  test('switches to GET after a 303', async () => {
    const { fetchFn, sent } = fakeFetch({
      'https://registry.test/a': redirectTo('https://storage.test/b', 303),
      'https://storage.test/b': ok(),
    });
    await new ScopedHttpClient(fetchFn).request('https://registry.test/a', { method: 'HEAD' });
    expect(sent.map((r) => r.method)).toEqual(['HEAD', 'GET']);
  });

  test('gives up after too many redirects', async () => {
    const { fetchFn } = fakeFetch({
      'https://registry.test/loop': redirectTo('https://registry.test/loop'),
    });
    await expect(
      new ScopedHttpClient(fetchFn).request('https://registry.test/loop', { maxRedirects: 2 }),
    ).rejects.toMatchObject({ code: 'TRANSFER.HTTP' });
  });

  test('refuses non-http redirect targets', async () => {
    const { fetchFn, sent } = fakeFetch({ 'https://registry.test/a': redirectTo('file:///etc/passwd') });
    const failure = new ScopedHttpClient(fetchFn).request('https://registry.test/a', { auth });
    await expect(failure).rejects.toBeInstanceOf(AcquisitionError);
    await expect(failure).rejects.toMatchObject({ code: 'TRANSFER.HTTP' });
    expect(sent).toHaveLength(1);
  });
});
