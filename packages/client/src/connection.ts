/**
 * Connection
 * ==========
 * Entry point to a forecast repository server. Owns the session and performs
 * every authenticated request on behalf of the resource proxies.
 *
 * URIs: all resource URIs end with '/'. The host is the only exception and
 * never carries a trailing slash.
 */

import { config as loadDotenv } from 'dotenv';
import {
  createLogger,
  DEFAULT_HOST,
  DEFAULT_TIMEOUT_MS,
  FormatError,
  loadClientConfig,
  loadCredentials,
  normalizeHost,
  PreconditionError,
  RemoteError,
  type Credentials,
  type Logger,
  type TokenExpiryPolicy,
} from '@predictkit/utils';
import { Forecast } from './resources/forecast.js';
import { Project } from './resources/project.js';
import { locatedElements } from './resources/resource.js';
import { Session } from './session.js';
import {
  AxiosTransport,
  type MultipartFile,
  type RequestBody,
  type Transport,
  type TransportResponse,
} from './transport.js';

export interface ConnectionOptions {
  /** Server root, e.g. https://forecasts.example.org */
  host?: string;
  timeoutMs?: number;
  tokenExpiry?: TokenExpiryPolicy;
  /** Defaults to an axios-backed transport */
  transport?: Transport;
  /** Milliseconds since the epoch; used for token expiry checks */
  now?: () => number;
}

export interface EnvironmentOptions {
  /** Defaults to process.env after loading .env */
  env?: NodeJS.ProcessEnv;
  transport?: Transport;
}

export class Connection {
  readonly host: string;
  private readonly transport: Transport;
  private readonly tokenExpiry: TokenExpiryPolicy;
  private readonly now: () => number;
  private readonly log: Logger;
  private credentials?: Credentials;
  private session?: Session;

  constructor(options: ConnectionOptions = {}) {
    this.host = normalizeHost(options.host ?? DEFAULT_HOST);
    this.tokenExpiry = options.tokenExpiry ?? 'always';
    this.now = options.now ?? Date.now;
    this.transport =
      options.transport ?? new AxiosTransport({ timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS });
    this.log = createLogger('client').child({ host: this.host });
  }

  /**
   * Connect and authenticate using PREDICTKIT_* environment variables
   */
  static async fromEnvironment(options: EnvironmentOptions = {}): Promise<Connection> {
    if (!options.env) {
      loadDotenv();
    }
    const env = options.env ?? process.env;
    const config = loadClientConfig(env);
    const credentials = loadCredentials(env);

    const connection = new Connection({ ...config, transport: options.transport });
    await connection.authenticate(credentials.username, credentials.password);
    return connection;
  }

  get isAuthenticated(): boolean {
    return this.session !== undefined;
  }

  /**
   * Obtain a token for the credentials. Session and credentials are replaced
   * together, and only when the exchange succeeds.
   */
  async authenticate(username: string, password: string): Promise<void> {
    const credentials = { username, password };
    const session = await Session.authenticate(this.transport, this.host, credentials, {
      tokenExpiry: this.tokenExpiry,
      now: this.now,
    });
    this.credentials = credentials;
    this.session = session;
    this.log.debug('Authenticated', { username });
  }

  /**
   * Renew the token with the stored credentials if the session reports it expired
   */
  async reauthenticateIfNeeded(): Promise<void> {
    const session = this.requireSession();
    if (session.isExpired() && this.credentials) {
      this.log.info('Re-authenticating expired token', { username: this.credentials.username });
      await this.authenticate(this.credentials.username, this.credentials.password);
    }
  }

  /**
   * Authenticated GET expecting 200 and a JSON body
   */
  async fetchJson(uri: string): Promise<unknown> {
    const response = await this.send('GET', uri, { Accept: 'application/json' });
    this.expectStatus(response, uri, 200);
    return this.parseJson(response, uri);
  }

  /**
   * Authenticated POST of a JSON body expecting 200 and a JSON body
   */
  async postJson(uri: string, value: unknown): Promise<unknown> {
    const response = await this.send('POST', uri, { Accept: 'application/json' }, { kind: 'json', value });
    this.expectStatus(response, uri, 200);
    return this.parseJson(response, uri);
  }

  /**
   * Authenticated multipart POST (form fields plus one file) expecting 200 and a JSON body
   */
  async postMultipart(uri: string, fields: Record<string, string>, file: MultipartFile): Promise<unknown> {
    const response = await this.send(
      'POST',
      uri,
      { Accept: 'application/json' },
      { kind: 'multipart', fields, file }
    );
    this.expectStatus(response, uri, 200);
    return this.parseJson(response, uri);
  }

  /**
   * Authenticated DELETE expecting 204
   */
  async deleteResource(uri: string): Promise<void> {
    const response = await this.send('DELETE', uri, { Accept: 'application/json' });
    this.expectStatus(response, uri, 204);
  }

  /**
   * All projects visible to the authenticated user, each pre-seeded from the list response
   */
  async projects(): Promise<Project[]> {
    const listUri = `${this.host}/api/projects/`;
    const json = await this.fetchJson(listUri);
    return locatedElements(listUri, json).map((element) => new Project(this, element.uri, element.json));
  }

  /**
   * Unfetched proxy for a project known by id
   */
  project(projectId: number): Project {
    return new Project(this, `${this.host}/api/project/${projectId}/`);
  }

  /**
   * Unfetched proxy for a forecast known by id
   */
  forecast(forecastId: number): Forecast {
    return new Forecast(this, `${this.host}/api/forecast/${forecastId}/`);
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new PreconditionError('Not authenticated: call authenticate() first', { host: this.host });
    }
    return this.session;
  }

  private async send(
    method: 'GET' | 'POST' | 'DELETE',
    uri: string,
    headers: Record<string, string>,
    body?: RequestBody
  ): Promise<TransportResponse> {
    await this.reauthenticateIfNeeded();
    const session = this.requireSession();
    this.log.debug(`${method} ${uri}`, { method, uri });
    return this.transport.request({
      method,
      url: uri,
      headers: { ...headers, Authorization: session.authorizationHeader() },
      body,
    });
  }

  private expectStatus(response: TransportResponse, uri: string, expected: number): void {
    if (response.status !== expected) {
      this.log.warn('Unexpected response status', { uri, status: response.status, expected });
      throw new RemoteError(uri, expected, response.status, response.body);
    }
  }

  private parseJson(response: TransportResponse, uri: string): unknown {
    try {
      const json: unknown = JSON.parse(response.body);
      return json;
    } catch (error) {
      throw new FormatError(
        `Response from ${uri} is not JSON: ${error instanceof Error ? error.message : String(error)}`,
        { uri }
      );
    }
  }
}
