import type { Connection } from '../connection.js';
import { Resource, type ResourceKind } from './resource.js';
import { TargetSchema, type TargetJson } from './schemas.js';

export const TARGET_KIND: ResourceKind<TargetJson> = {
  name: 'Target',
  schema: TargetSchema,
  displayKeys: ['name', 'type', 'is_step_ahead', 'step_ahead_increment', 'unit'],
};

export class Target extends Resource<TargetJson> {
  constructor(connection: Connection, uri: string, initialJson?: unknown) {
    super(connection, uri, TARGET_KIND, initialJson);
  }

  async name(): Promise<string> {
    return (await this.json()).name;
  }

  async type(): Promise<string> {
    return (await this.json()).type;
  }

  async isStepAhead(): Promise<boolean> {
    return (await this.json()).is_step_ahead;
  }

  async stepAheadIncrement(): Promise<number | null> {
    return (await this.json()).step_ahead_increment;
  }

  /** Unit of measure of the predicted quantity, e.g. "percent" */
  async unit(): Promise<string | null> {
    return (await this.json()).unit;
  }
}
