import type { StandardSchemaV1 } from '@standard-schema/spec';
import { z } from 'zod';
import { Authenticator, type Credentials, type SignupRequest } from '../auth/authenticator.js';
import {
  DEFAULT_TOKEN_SKEW_SECONDS,
  loadConfig,
  type RobleConfig,
  type RoblePaths,
  resolvePaths,
} from '../config/config.js';
import type { AuthError } from '../error/authError.js';
import { ValidationError } from '../error/validationError.js';
import { FetchTransport } from '../fetch/client.js';
import { type Token, TokenStore } from '../session/tokenStore.js';
import type {
  FetchFunction,
  HeaderOptions,
  TransportProvider,
  TransportProviderDefinition,
} from '../types/request.js';
import type { QueryParams } from '../utils/constructUrl.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { RequestDispatcher } from './dispatcher.js';
import {
  type OperationError,
  createRequestSpec,
  type RequestError,
  type RequestResult,
  type RequestSpec,
  type SendOptions,
} from './types.js';

/** Constructor options for {@link RobleClient}, extends {@link RobleConfig}. */
export interface RobleClientProps extends RobleConfig {
  /** Transport implementation. Defaults to {@link FetchTransport}. */
  transportProvider?: TransportProvider;
  /** Fetch implementation handed to the transport. @default globalThis.fetch */
  fetch?: FetchFunction;
  /** Headers sent with every call */
  headers?: HeaderOptions;
  /** Logging hook; silent by default */
  logger?: Logger;
}

/** Options accepted by {@link RobleClient.config} at runtime. */
export interface RobleClientConfig
  extends Pick<RobleClientProps, 'tokenSkewSeconds' | 'maxRetries' | 'timeout' | 'defaultTokenTtlSeconds'> {
  headers?: HeaderOptions;
  logger?: Logger;
  serverLogout?: boolean;
}

/** A database record as stored by the service; its fields are the caller's business. */
export type DatabaseRecord = Record<string, unknown>;

/** Options for {@link RobleClient.read}. */
export interface ReadOptions extends SendOptions {
  /** Column filters, sent as query params next to `tableName` */
  filter?: QueryParams;
}

/** Options for {@link RobleClient.update} and {@link RobleClient.delete}. */
export interface RecordOptions extends SendOptions {
  /** Column identifying the record. @default '_id' */
  idColumn?: string;
}

/**
 * Client for a Roble project that:
 * - owns one session (token store, authenticator, dispatcher) per instance,
 * - logs in with credentials and keeps the token fresh,
 * - exposes the database endpoints as `create`, `read`, `update` and `delete`,
 * - returns error-first tuples via {@link SafeWrapAsync}; nothing is thrown.
 *
 * @example
 * const client = new RobleClient({ baseUrl: 'https://roble-api.example.com', projectId: 'inventory_1a2b' });
 * const [errLogin] = await client.authenticate({ email: 'ana@example.com', password: 'test-password' });
 * const [errRead, products] = await client.read('Product');
 */
export class RobleClient {
  #store: TokenStore;
  #transport: TransportProviderDefinition;
  #authenticator: Authenticator;
  #dispatcher: RequestDispatcher;
  #paths: RoblePaths;
  #serverLogout: boolean;
  #logger: Logger;

  /**
   * Wires together the transport, token store, authenticator and dispatcher.
   */
  constructor({
    baseUrl,
    projectId,
    tokenSkewSeconds = DEFAULT_TOKEN_SKEW_SECONDS,
    maxRetries,
    timeout,
    defaultTokenTtlSeconds,
    serverLogout = true,
    paths,
    transportProvider = FetchTransport,
    fetch,
    headers,
    logger = silentLogger,
  }: RobleClientProps) {
    this.#paths = resolvePaths(projectId, paths);
    this.#serverLogout = serverLogout;
    this.#logger = logger;
    this.#store = new TokenStore(tokenSkewSeconds * 1000);
    this.#transport = new transportProvider({
      headers,
      ...(timeout !== undefined && { timeout }),
      ...(fetch && { fetch }),
    });
    this.#authenticator = new Authenticator({
      transport: this.#transport,
      store: this.#store,
      baseUrl,
      paths: this.#paths,
      defaultTokenTtlSeconds,
      timeout,
      logger,
    });
    this.#dispatcher = new RequestDispatcher({
      transport: this.#transport,
      store: this.#store,
      authenticator: this.#authenticator,
      baseUrl,
      maxRetries,
      timeout,
      logger,
    });
  }

  /**
   * Builds a client from `ROBLE_*` environment variables (see {@link loadConfig}).
   */
  static async fromEnv(
    env?: Readonly<Record<string, string | undefined>>,
    props: Omit<RobleClientProps, keyof RobleConfig> = {},
  ): SafeWrapAsync<ValidationError, RobleClient> {
    const [errConfig, config] = await loadConfig(env);
    if (errConfig) {
      return [errConfig, null];
    }

    return [null, new RobleClient({ ...config, ...props })];
  }

  /**
   * Updates settings at runtime and propagates them to the underlying components.
   * The session is kept.
   */
  config(opts: RobleClientConfig) {
    const { tokenSkewSeconds, maxRetries, timeout, defaultTokenTtlSeconds, headers, logger, serverLogout } = opts;

    if (tokenSkewSeconds !== undefined) {
      this.#store.skew = tokenSkewSeconds * 1000;
    }

    if (serverLogout !== undefined) {
      this.#serverLogout = serverLogout;
    }

    if (logger) {
      this.#logger = logger;
    }

    this.#transport.config({ ...(headers && { headers }) });
    this.#authenticator.config({ defaultTokenTtlSeconds, timeout, logger });
    this.#dispatcher.config({ maxRetries, timeout, logger });
  }

  /**
   * Logs in and starts (or replaces) the session.
   */
  authenticate(credentials: Credentials): SafeWrapAsync<AuthError, Token> {
    return this.#authenticator.login(credentials);
  }

  /**
   * Ends the session. The local session is cleared right away; the logout endpoint is
   * then called best-effort and its failure is only logged.
   */
  async logout(): Promise<void> {
    const token = this.#store.get();
    this.#store.clear();
    if (!token || !this.#serverLogout) {
      return;
    }

    const [err] = await this.#authenticator.logout(token);
    if (err) {
      this.#logger.warn('server logout failed, local session cleared anyway', { kind: err.kind, status: err.status });
    }
  }

  /**
   * Creates a user. Does not log in.
   */
  signup(request: SignupRequest): SafeWrapAsync<AuthError, unknown> {
    return this.#authenticator.signup(request);
  }

  /**
   * Current token, or `undefined` when there is no session.
   */
  session(): Token | undefined {
    return this.#store.get();
  }

  /**
   * Sends an arbitrary request through the session, for endpoints without a helper.
   */
  send<T = unknown>(spec: RequestSpec, opts?: SendOptions): SafeWrapAsync<RequestError, RequestResult<T>> {
    return this.#dispatcher.send<T>(createRequestSpec(spec), opts);
  }

  /**
   * Reads the records of a table, optionally filtered by column values.
   */
  async read(table: string, opts: ReadOptions = {}): SafeWrapAsync<OperationError, DatabaseRecord[]> {
    const { filter, ...sendOpts } = opts;
    const [err, result] = await this.send(
      { method: 'GET', path: `${this.#paths.database}/read`, query: { ...filter, tableName: table } },
      sendOpts,
    );
    if (err) {
      return [err, null];
    }

    const [errRecords, records] = await validator(result.data, recordsSchema);
    if (errRecords) {
      return [new ValidationError(`error reading ${table}, expected a list of records`, errRecords.issues), null];
    }

    return [null, records];
  }

  /**
   * Like {@link read}, validating every record against `schema` and returning the parsed
   * values. The first invalid record fails the whole read.
   */
  async readAs<Schema extends StandardSchemaV1>(
    table: string,
    schema: Schema,
    opts: ReadOptions = {},
  ): SafeWrapAsync<OperationError, StandardSchemaV1.InferOutput<Schema>[]> {
    const [err, records] = await this.read(table, opts);
    if (err) {
      return [err, null];
    }

    const parsed: StandardSchemaV1.InferOutput<Schema>[] = [];
    for (const [index, record] of records.entries()) {
      const [errRecord, value] = await validator(record, schema);
      if (errRecord) {
        return [
          new ValidationError(`error validating record ${index} of ${table}`, errRecord.issues, { cause: errRecord }),
          null,
        ];
      }

      parsed.push(value);
    }

    return [null, parsed];
  }

  /**
   * Inserts one or more records into a table.
   */
  async create(
    table: string,
    records: DatabaseRecord | DatabaseRecord[],
    opts?: SendOptions,
  ): SafeWrapAsync<RequestError, unknown> {
    const [err, result] = await this.send(
      {
        method: 'POST',
        path: `${this.#paths.database}/insert`,
        body: { tableName: table, records: Array.isArray(records) ? records : [records] },
      },
      opts,
    );
    if (err) {
      return [err, null];
    }

    return [null, result.data];
  }

  /**
   * Applies `updates` to the record whose `idColumn` equals `id`.
   */
  async update(
    table: string,
    id: string,
    updates: DatabaseRecord,
    opts: RecordOptions = {},
  ): SafeWrapAsync<RequestError, unknown> {
    const { idColumn = '_id', ...sendOpts } = opts;
    const [err, result] = await this.send(
      {
        method: 'PUT',
        path: `${this.#paths.database}/update`,
        body: { tableName: table, idColumn, idValue: id, updates },
      },
      sendOpts,
    );
    if (err) {
      return [err, null];
    }

    return [null, result.data];
  }

  /**
   * Deletes the record whose `idColumn` equals `id`.
   */
  async delete(table: string, id: string, opts: RecordOptions = {}): SafeWrapAsync<RequestError, unknown> {
    const { idColumn = '_id', ...sendOpts } = opts;
    const [err, result] = await this.send(
      {
        method: 'DELETE',
        path: `${this.#paths.database}/delete`,
        body: { tableName: table, idColumn, idValue: id },
      },
      sendOpts,
    );
    if (err) {
      return [err, null];
    }

    return [null, result.data];
  }

  /**
   * Releases transport resources. The client should not be used afterwards.
   */
  dispose() {
    this.#store.clear();
    this.#transport.dispose?.();
  }
}

const recordsSchema = z.array(z.record(z.string(), z.unknown()));
