/**
 * Resource Proxy
 * ==============
 * Local stand-in for one server object at a URI. Holds an optional cached
 * snapshot of the object's JSON.
 *
 * The cache is read-through only: `json()` fetches when nothing is cached,
 * `refresh()` always fetches. Nothing invalidates it automatically and no
 * local change is ever pushed back to the server.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';
import { createLogger, FormatError, PreconditionError } from '@predictkit/utils';
import type { Connection } from '../connection.js';
import { LocatorSchema } from './schemas.js';
import { idForUri } from './uri.js';

/**
 * Static description of one resource kind
 */
export interface ResourceKind<T extends object> {
  name: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  /** Snapshot fields shown by toString(), in order */
  displayKeys: readonly (keyof T & string)[];
}

type CacheState<T> =
  | { status: 'unfetched' }
  | { status: 'cached'; snapshot: T }
  | { status: 'deleted' };

const log = createLogger('client:resource');

const ListSchema = z.array(z.unknown());

export function parseSnapshot<T extends object>(kind: ResourceKind<T>, uri: string, json: unknown): T {
  const result = kind.schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new FormatError(`Malformed ${kind.name} snapshot from ${uri}: ${issues}`, {
      uri,
      kind: kind.name,
    });
  }
  return result.data;
}

/**
 * Pair each element of a list response with the URI it names
 */
export function locatedElements(listUri: string, json: unknown): { uri: string; json: unknown }[] {
  const list = ListSchema.safeParse(json);
  if (!list.success) {
    throw new FormatError(`Expected a JSON list from ${listUri}`, { uri: listUri });
  }
  return list.data.map((element, index) => {
    const located = LocatorSchema.safeParse(element);
    if (!located.success) {
      throw new FormatError(`List element ${index} from ${listUri} has no url`, { uri: listUri, index });
    }
    return { uri: located.data.url, json: element };
  });
}

export abstract class Resource<T extends object> {
  /** Always ends with '/' */
  readonly uri: string;
  protected readonly connection: Connection;
  private readonly kind: ResourceKind<T>;
  private state: CacheState<T>;

  /**
   * @param initialJson - JSON the caller already has for this object (e.g. from a list
   * response); seeds the cache so the first access makes no request
   */
  protected constructor(connection: Connection, uri: string, kind: ResourceKind<T>, initialJson?: unknown) {
    this.connection = connection;
    this.uri = uri;
    this.kind = kind;
    this.state =
      initialJson === undefined
        ? { status: 'unfetched' }
        : { status: 'cached', snapshot: parseSnapshot(kind, uri, initialJson) };
  }

  /**
   * Derived from the URI alone, so it is available before any fetch
   */
  get id(): number {
    return idForUri(this.uri);
  }

  get isCached(): boolean {
    return this.state.status === 'cached';
  }

  get isDeleted(): boolean {
    return this.state.status === 'deleted';
  }

  /**
   * The cached snapshot, fetching it first if none is cached yet
   */
  async json(): Promise<T> {
    if (this.state.status === 'cached') {
      log.trace('Cache hit', { uri: this.uri });
      return this.state.snapshot;
    }
    return this.refresh();
  }

  /**
   * Fetch and cache a new snapshot. On failure the previous snapshot stays.
   */
  async refresh(): Promise<T> {
    this.assertNotDeleted('refresh');
    const json = await this.connection.fetchJson(this.uri);
    const snapshot = parseSnapshot(this.kind, this.uri, json);
    // a delete may have completed while the fetch was in flight
    this.assertNotDeleted('refresh');
    this.state = { status: 'cached', snapshot };
    return snapshot;
  }

  /**
   * Delete the object on the server. The proxy is unusable afterwards.
   */
  async delete(): Promise<void> {
    this.assertNotDeleted('delete');
    await this.connection.deleteResource(this.uri);
    this.state = { status: 'deleted' };
  }

  protected assertNotDeleted(action: string): void {
    if (this.state.status === 'deleted') {
      throw new PreconditionError(`${this.kind.name} ${this.uri} was deleted; cannot ${action}`, {
        uri: this.uri,
      });
    }
  }

  /**
   * Fresh list fetch of `<uri><suffix>`, one pre-seeded child per element. Never cached.
   */
  protected async fetchChildren<C>(suffix: string, build: (uri: string, json: unknown) => C): Promise<C[]> {
    this.assertNotDeleted(`list ${suffix}`);
    const listUri = `${this.uri}${suffix}`;
    const json = await this.connection.fetchJson(listUri);
    return locatedElements(listUri, json).map((element) => build(element.uri, element.json));
  }

  protected describe(snapshot: T): string[] {
    return this.kind.displayKeys
      .filter((key) => key in snapshot)
      .map((key) => `${key}=${JSON.stringify(snapshot[key])}`);
  }

  /**
   * Never fetches: display fields appear only once a snapshot is cached
   */
  toString(): string {
    const parts = [`uri=${this.uri}`, `id=${this.id}`];
    if (this.state.status === 'cached') {
      parts.push(...this.describe(this.state.snapshot));
    }
    return `${this.kind.name}(${parts.join(', ')})`;
  }
}
