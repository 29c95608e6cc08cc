import jwt from 'jsonwebtoken';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resolvePaths } from '../config/config.js';
import { AuthError } from '../error/authError.js';
import { getValidationError } from '../error/validationError.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import { type Token, TokenStore } from '../session/tokenStore.js';
import type { TransportProviderDefinition, TransportRequest, TransportResponse } from '../types/request.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import { Authenticator, type AuthenticatorOptions } from './authenticator.js';

const NOW = Date.parse('2026-01-01T00:00:00Z');
const BASE_URL = 'https://roble.test';

type Reply = SafeWrap<Error, TransportResponse>;
type Handler = (request: TransportRequest) => Reply | Promise<Reply>;

const reply = (status: number, body: unknown = null): Reply => [null, { status, headers: new Headers(), body }];

const fakeJwt = (claims: Record<string, unknown>) =>
  jwt.sign(claims, 'test-secret', { algorithm: 'HS256', noTimestamp: true });

const token = (overrides: Partial<Token> = {}): Token =>
  Object.freeze({
    accessToken: 'access-1',
    refreshToken: 'refresh-1',
    issuedAt: NOW - 900_000,
    expiresAt: NOW - 1_000,
    ...overrides,
  });

function setup(handler: Handler, opts: Partial<AuthenticatorOptions> = {}) {
  const request = vi.fn(async (req: TransportRequest): SafeWrapAsync<Error, TransportResponse> => handler(req));
  const transport: TransportProviderDefinition = { request, config: vi.fn() };
  const store = new TokenStore();
  const auth = new Authenticator({ transport, store, baseUrl: BASE_URL, paths: resolvePaths('demo'), ...opts });

  return { auth, store, request };
}

function sentBody(request: TransportRequest | undefined): unknown {
  return request?.body === undefined ? undefined : JSON.parse(request.body);
}

describe('Authenticator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('login', () => {
    it('posts the credentials and stores the token', async () => {
      const { auth, store, request } = setup(() =>
        reply(201, { accessToken: 'access-1', refreshToken: 'refresh-1', expiresIn: 600 }),
      );

      const [err, session] = await auth.login({ email: 'ana@example.com', password: 'test-password' });

      expect(err).toBeNull();
      expect(session).toEqual({ accessToken: 'access-1', refreshToken: 'refresh-1', issuedAt: NOW, expiresAt: NOW + 600_000 });
      expect(Object.isFrozen(session)).toBe(true);
      expect(store.get()).toBe(session);

      const sent = request.mock.calls[0]?.[0];
      expect(sent?.method).toBe('POST');
      expect(sent?.url).toBe('https://roble.test/auth/demo/login');
      expect(sentBody(sent)).toEqual({ email: 'ana@example.com', password: 'test-password' });

      const headers = mergeHeaderOptions(sent?.headers);
      expect(headers.get('content-type')).toBe('application/json');
      expect(headers.get('authorization')).toBeNull();
    });

    it('sends an api key as its own body', async () => {
      const { auth, request } = setup(() => reply(200, { accessToken: 'access-1' }));

      await auth.login({ apiKey: 'test-api-key' });

      expect(sentBody(request.mock.calls[0]?.[0])).toEqual({ apiKey: 'test-api-key' });
    });

    it('returns InvalidCredentials on a 4xx and leaves the store empty', async () => {
      const { auth, store } = setup(() => reply(401, { message: 'Invalid credentials' }));

      const [err, session] = await auth.login({ email: 'a', password: 'bad' });

      expect(session).toBeNull();
      expect(err).toBeInstanceOf(AuthError);
      expect(err?.kind).toBe('InvalidCredentials');
      expect(err?.status).toBe(401);
      expect(err?.body).toEqual({ message: 'Invalid credentials' });
      expect(err?.message).toBe('error logging in, status 401');
      expect(store.get()).toBeUndefined();
    });

    it('returns ServerError on a 5xx', async () => {
      const { auth, store } = setup(() => reply(502));

      const [err] = await auth.login({ email: 'ana@example.com', password: 'test-password' });

      expect(err?.kind).toBe('ServerError');
      expect(err?.status).toBe(502);
      expect(store.get()).toBeUndefined();
    });

    it('returns Unreachable with the transport failure as cause', async () => {
      const failure = new Error('connection refused');
      const { auth } = setup(() => [failure, null]);

      const [err] = await auth.login({ email: 'ana@example.com', password: 'test-password' });

      expect(err?.kind).toBe('Unreachable');
      expect(err?.message).toBe('error reaching login endpoint');
      expect(err?.cause).toBe(failure);
    });

    it('returns InvalidResponse when the body has no access token', async () => {
      const { auth, store } = setup(() => reply(200, { refreshToken: 'refresh-1' }));

      const [err] = await auth.login({ email: 'ana@example.com', password: 'test-password' });

      expect(err?.kind).toBe('InvalidResponse');
      expect(getValidationError(err)?.issues.map((issue) => issue.path)).toEqual([['accessToken']]);
      expect(store.get()).toBeUndefined();
    });

    it('returns InvalidResponse for a non-2xx, non-error status', async () => {
      const { auth } = setup(() => reply(302));

      const [err] = await auth.login({ email: 'ana@example.com', password: 'test-password' });

      expect(err?.kind).toBe('InvalidResponse');
    });
  });

  describe('token expiry', () => {
    const login = async (body: unknown, opts: Partial<AuthenticatorOptions> = {}) => {
      const { auth } = setup(() => reply(200, body), opts);
      return auth.login({ email: 'ana@example.com', password: 'test-password' });
    };

    it('takes an absolute expiresAt in epoch seconds', async () => {
      const [, session] = await login({ accessToken: 'access-1', expiresAt: NOW / 1000 + 120 });

      expect(session?.expiresAt).toBe(NOW + 120_000);
    });

    it('reads the exp claim of a JWT access token', async () => {
      const [, session] = await login({ accessToken: fakeJwt({ sub: 'user-1', exp: NOW / 1000 + 300 }) });

      expect(session?.expiresAt).toBe(NOW + 300_000);
    });

    it('prefers expiresIn over the JWT claim', async () => {
      const [, session] = await login({ accessToken: fakeJwt({ exp: NOW / 1000 + 300 }), expiresIn: 60 });

      expect(session?.expiresAt).toBe(NOW + 60_000);
    });

    it('falls back to the default lifetime for an opaque token', async () => {
      const [, session] = await login({ accessToken: 'opaque' });

      expect(session?.expiresAt).toBe(NOW + 900_000);
    });

    it('uses a configured default lifetime', async () => {
      const [, session] = await login({ accessToken: 'opaque' }, { defaultTokenTtlSeconds: 60 });

      expect(session?.expiresAt).toBe(NOW + 60_000);
    });

    it('rejects a token that is already expired', async () => {
      const [err, session] = await login({ accessToken: fakeJwt({ exp: NOW / 1000 - 10 }) });

      expect(session).toBeNull();
      expect(err?.kind).toBe('InvalidResponse');
      expect(err?.message).toBe('error reading token response, token already expired');
    });
  });

  describe('refresh', () => {
    it('returns RefreshUnsupported without a network call when there is no refresh token', async () => {
      const { auth, store, request } = setup(() => reply(200, { accessToken: 'access-2' }));
      const current = token({ refreshToken: undefined });
      store.set(current);

      const [err] = await auth.refresh(current);

      expect(err?.kind).toBe('RefreshUnsupported');
      expect(request).not.toHaveBeenCalled();
      expect(store.get()).toBe(current);
    });

    it('posts the refresh token and replaces the stored token', async () => {
      const { auth, store, request } = setup(() => reply(200, { accessToken: 'access-2' }));
      const current = token();
      store.set(current);

      const [err, refreshed] = await auth.refresh(current);

      expect(err).toBeNull();
      expect(refreshed).toEqual({ accessToken: 'access-2', refreshToken: 'refresh-1', issuedAt: NOW, expiresAt: NOW + 900_000 });
      expect(store.get()).toBe(refreshed);

      const sent = request.mock.calls[0]?.[0];
      expect(sent?.url).toBe('https://roble.test/auth/demo/refresh-token');
      expect(sentBody(sent)).toEqual({ refreshToken: 'refresh-1' });
    });

    it('takes a rotated refresh token', async () => {
      const { auth, store } = setup(() => reply(200, { accessToken: 'access-2', refreshToken: 'refresh-2' }));
      const current = token();
      store.set(current);

      const [, refreshed] = await auth.refresh(current);

      expect(refreshed?.refreshToken).toBe('refresh-2');
    });

    it('returns RefreshRejected on a 4xx and clears the store', async () => {
      const { auth, store } = setup(() => reply(400, { message: 'invalid refresh token' }));
      const current = token();
      store.set(current);

      const [err] = await auth.refresh(current);

      expect(err?.kind).toBe('RefreshRejected');
      expect(err?.status).toBe(400);
      expect(store.get()).toBeUndefined();
    });

    it('keeps the session on a 5xx', async () => {
      const { auth, store } = setup(() => reply(503));
      const current = token();
      store.set(current);

      const [err] = await auth.refresh(current);

      expect(err?.kind).toBe('ServerError');
      expect(store.get()).toBe(current);
    });

    it('keeps the session when the endpoint is unreachable', async () => {
      const { auth, store } = setup(() => [new Error('socket hang up'), null]);
      const current = token();
      store.set(current);

      const [err] = await auth.refresh(current);

      expect(err?.kind).toBe('Unreachable');
      expect(store.get()).toBe(current);
    });

    it('coalesces concurrent refreshes into one call', async () => {
      const { auth, store, request } = setup(() => reply(200, { accessToken: 'access-2' }));
      const current = token();
      store.set(current);

      const [first, second] = await Promise.all([auth.refresh(current), auth.refresh(current)]);

      expect(request).toHaveBeenCalledTimes(1);
      expect(first).toBe(second);
      expect(first[1]?.accessToken).toBe('access-2');
    });

    it('starts a new call once the previous refresh settled', async () => {
      const { auth, store, request } = setup(() => reply(200, { accessToken: 'access-2' }));
      const current = token();
      store.set(current);

      const [, refreshed] = await auth.refresh(current);
      if (!refreshed) {
        throw new Error('expected a refreshed token');
      }
      await auth.refresh(refreshed);

      expect(request).toHaveBeenCalledTimes(2);
    });

    it('returns the newer stored token for a stale one without a call', async () => {
      const { auth, store, request } = setup(() => reply(200, { accessToken: 'access-3' }));
      const newer = token({ accessToken: 'access-2', issuedAt: NOW, expiresAt: NOW + 600_000 });
      store.set(newer);

      const [err, result] = await auth.refresh(token());

      expect(err).toBeNull();
      expect(result).toBe(newer);
      expect(request).not.toHaveBeenCalled();
    });

    it('discards the result when the session is cleared mid-refresh', async () => {
      let open = () => {};
      const gate = new Promise<void>((resolve) => {
        open = () => resolve();
      });
      const { auth, store } = setup(async () => {
        await gate;
        return reply(200, { accessToken: 'access-2' });
      });
      const current = token();
      store.set(current);

      const pending = auth.refresh(current);
      store.clear();
      open();
      const [err] = await pending;

      expect(err?.kind).toBe('NotAuthenticated');
      expect(store.get()).toBeUndefined();
    });

    it('leaves a session from a new login in place when an old refresh settles', async () => {
      let open = () => {};
      const gate = new Promise<void>((resolve) => {
        open = () => resolve();
      });
      const { auth, store } = setup(async () => {
        await gate;
        return reply(400);
      });
      const current = token();
      const replacement = token({ accessToken: 'access-9', issuedAt: NOW, expiresAt: NOW + 600_000 });
      store.set(current);

      const pending = auth.refresh(current);
      store.set(replacement);
      open();
      const [err] = await pending;

      expect(err?.kind).toBe('NotAuthenticated');
      expect(store.get()).toBe(replacement);
    });

    it('never commits after a clear that lands between the response and the commit', async () => {
      const committed: number[] = [];

      for (let ticks = 0; ticks <= 10; ticks++) {
        const { auth, store } = setup(() => reply(201, { accessToken: 'access-2' }));
        const current = token();
        store.set(current);

        const pending = auth.refresh(current);
        for (let tick = 0; tick < ticks; tick++) {
          await Promise.resolve();
        }
        store.clear();
        await pending;

        if (store.get() !== undefined) {
          committed.push(ticks);
        }
      }

      expect(committed).toEqual([]);
    });

    it('discards a response that is read after the session was cleared', async () => {
      const store = new TokenStore();
      const body = {
        get accessToken() {
          // read while the token response is validated, after the response arrived
          store.clear();
          return 'access-2';
        },
      };
      const request = vi.fn(async (): SafeWrapAsync<Error, TransportResponse> => reply(201, body));
      const auth = new Authenticator({
        transport: { request, config: vi.fn() },
        store,
        baseUrl: BASE_URL,
        paths: resolvePaths('demo'),
      });
      const current = token();
      store.set(current);

      const [err, refreshed] = await auth.refresh(current);

      expect(refreshed).toBeNull();
      expect(err?.kind).toBe('NotAuthenticated');
      expect(store.get()).toBeUndefined();
    });
  });

  describe('signup', () => {
    it('posts the new user and returns the response body', async () => {
      const { auth, store, request } = setup(() => reply(201, { id: 'user-1' }));

      const [err, body] = await auth.signup({ email: 'ana@example.com', password: 'test-password', name: 'Ana' });

      expect(err).toBeNull();
      expect(body).toEqual({ id: 'user-1' });
      expect(store.get()).toBeUndefined();

      const sent = request.mock.calls[0]?.[0];
      expect(sent?.url).toBe('https://roble.test/auth/demo/signup-direct');
      expect(sentBody(sent)).toEqual({ email: 'ana@example.com', password: 'test-password', name: 'Ana' });
    });

    it('returns InvalidCredentials on a 4xx', async () => {
      const { auth } = setup(() => reply(409, { message: 'email taken' }));

      const [err] = await auth.signup({ email: 'ana@example.com', password: 'test-password', name: 'Ana' });

      expect(err?.kind).toBe('InvalidCredentials');
      expect(err?.message).toBe('error signing up, status 409');
    });
  });

  describe('logout', () => {
    it('posts the bearer token without a body', async () => {
      const { auth, request } = setup(() => reply(204));

      const [err] = await auth.logout(token());

      expect(err).toBeNull();
      const sent = request.mock.calls[0]?.[0];
      expect(sent?.url).toBe('https://roble.test/auth/demo/logout');
      expect(sent?.body).toBeUndefined();

      const headers = mergeHeaderOptions(sent?.headers);
      expect(headers.get('authorization')).toBe('Bearer access-1');
      expect(headers.get('content-type')).toBeNull();
    });

    it('maps a 401 to NotAuthenticated', async () => {
      const { auth } = setup(() => reply(401));

      const [err] = await auth.logout(token());

      expect(err?.kind).toBe('NotAuthenticated');
      expect(err?.status).toBe(401);
    });
  });
});
