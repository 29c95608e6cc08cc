import jwt from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';
import { decodeJwtTimeClaims } from './jwt.js';

/** Signs without adding an `iat` unless the payload carries one. */
function signed(payload: Record<string, unknown>): string {
  return jwt.sign(payload, 'test-secret', { algorithm: 'HS256', noTimestamp: !('iat' in payload) });
}

describe('decodeJwtTimeClaims', () => {
  it('reads exp and iat', () => {
    expect(decodeJwtTimeClaims(signed({ sub: 'user-1', iat: 1_700_000_000, exp: 1_700_000_900 }))).toEqual({
      iat: 1_700_000_000,
      exp: 1_700_000_900,
    });
  });

  it('returns empty claims for a JWT without time claims', () => {
    expect(decodeJwtTimeClaims(signed({ sub: 'user-1' }))).toEqual({});
  });

  it('returns null for opaque tokens', () => {
    expect(decodeJwtTimeClaims('opaque-access-token')).toBeNull();
  });

  it('returns null for a payload that is not JSON', () => {
    expect(decodeJwtTimeClaims('aGVhZGVy.bm90LWpzb24.sig')).toBeNull();
  });

  it('returns null for non-numeric claims', () => {
    // An object payload with a string exp is refused by sign(); a string payload is not checked
    expect(decodeJwtTimeClaims(jwt.sign('{"exp":"tomorrow"}', 'test-secret'))).toBeNull();
  });
});
