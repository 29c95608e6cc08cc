/**
 * Access/refresh token pair with its lifetime, in epoch milliseconds.
 * Invariant: `expiresAt > issuedAt`.
 */
export interface Token {
  readonly accessToken: string;
  readonly refreshToken?: string;
  readonly issuedAt: number;
  readonly expiresAt: number;
}

/** Default safety margin subtracted from a token's expiry. */
export const DEFAULT_SKEW_MS = 5_000;

/**
 * In-memory holder of the session's current {@link Token}. No I/O; one instance per client.
 */
export class TokenStore {
  #token: Token | undefined;
  #skew: number;

  /** Creates an empty store; `skewMs` is the default margin used by {@link isValid}. */
  constructor(skewMs = DEFAULT_SKEW_MS) {
    this.#skew = skewMs;
  }

  /** Default skew in milliseconds. */
  get skew(): number {
    return this.#skew;
  }

  set skew(skewMs: number) {
    this.#skew = skewMs;
  }

  set(token: Token) {
    this.#token = Object.isFrozen(token) ? token : Object.freeze({ ...token });
  }

  get(): Token | undefined {
    return this.#token;
  }

  clear() {
    this.#token = undefined;
  }

  /**
   * A token is valid while `now + skew < expiresAt`.
   */
  isValid(token: Token, skewMs = this.#skew): boolean {
    return Date.now() + skewMs < token.expiresAt;
  }
}
