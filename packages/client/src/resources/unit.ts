import type { Connection } from '../connection.js';
import { Resource, type ResourceKind } from './resource.js';
import { UnitSchema, type UnitJson } from './schemas.js';

export const UNIT_KIND: ResourceKind<UnitJson> = {
  name: 'Unit',
  schema: UnitSchema,
  displayKeys: ['name'],
};

/**
 * A location or other unit that predictions are made for
 */
export class Unit extends Resource<UnitJson> {
  constructor(connection: Connection, uri: string, initialJson?: unknown) {
    super(connection, uri, UNIT_KIND, initialJson);
  }

  async name(): Promise<string> {
    return (await this.json()).name;
  }
}
