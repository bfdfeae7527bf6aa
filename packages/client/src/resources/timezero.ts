import type { Connection } from '../connection.js';
import { Resource, type ResourceKind } from './resource.js';
import { TimeZeroSchema, type TimeZeroJson } from './schemas.js';

export const TIMEZERO_KIND: ResourceKind<TimeZeroJson> = {
  name: 'TimeZero',
  schema: TimeZeroSchema,
  displayKeys: ['timezero_date', 'data_version_date', 'is_season_start', 'season_name'],
};

/**
 * The date a forecast is made relative to. Dates are YYYY-MM-DD strings.
 */
export class TimeZero extends Resource<TimeZeroJson> {
  constructor(connection: Connection, uri: string, initialJson?: unknown) {
    super(connection, uri, TIMEZERO_KIND, initialJson);
  }

  async timezeroDate(): Promise<string> {
    return (await this.json()).timezero_date;
  }

  async dataVersionDate(): Promise<string | null> {
    return (await this.json()).data_version_date;
  }

  async isSeasonStart(): Promise<boolean> {
    return (await this.json()).is_season_start;
  }

  async seasonName(): Promise<string | null> {
    return (await this.json()).season_name;
  }
}
