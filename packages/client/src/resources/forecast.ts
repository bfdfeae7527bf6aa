import { csvRowsFromPredictionSet, parsePredictionSet, type CsvRow, type PredictionSet } from '@predictkit/formats';
import type { Connection } from '../connection.js';
import { Resource, type ResourceKind } from './resource.js';
import { ForecastSchema, type ForecastJson } from './schemas.js';
import { TimeZero } from './timezero.js';

export const FORECAST_KIND: ResourceKind<ForecastJson> = {
  name: 'Forecast',
  schema: ForecastSchema,
  displayKeys: ['source', 'created_at'],
};

export class Forecast extends Resource<ForecastJson> {
  constructor(connection: Connection, uri: string, initialJson?: unknown) {
    super(connection, uri, FORECAST_KIND, initialJson);
  }

  /** Name of the file the forecast was uploaded from */
  async source(): Promise<string> {
    return (await this.json()).source;
  }

  async createdAt(): Promise<string> {
    return (await this.json()).created_at;
  }

  /**
   * Unfetched proxy for the forecast's time zero
   */
  async timezero(): Promise<TimeZero> {
    const { time_zero: timeZero } = await this.json();
    return new TimeZero(this.connection, typeof timeZero === 'string' ? timeZero : timeZero.url);
  }

  /**
   * Download the forecast's predictions. Not cached: every call fetches.
   */
  async data(): Promise<PredictionSet> {
    this.assertNotDeleted('download data');
    const { forecast_data: dataUri } = await this.json();
    return parsePredictionSet(await this.connection.fetchJson(dataUri));
  }

  /**
   * The forecast's predictions as rows, header first
   */
  async csvRows(): Promise<CsvRow[]> {
    return csvRowsFromPredictionSet(await this.data());
  }
}
