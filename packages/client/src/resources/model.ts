import { DateTime } from 'luxon';
import { csvFromPredictionSet, type PredictionSet } from '@predictkit/formats';
import { FormatError, ValidationError } from '@predictkit/utils';
import type { Connection } from '../connection.js';
import { Forecast } from './forecast.js';
import { Resource, type ResourceKind } from './resource.js';
import { LocatorSchema, ModelSchema, type ModelJson } from './schemas.js';
import { UploadFileJob } from './upload-file-job.js';

export const MODEL_KIND: ResourceKind<ModelJson> = {
  name: 'Model',
  schema: ModelSchema,
  displayKeys: ['name'],
};

export type ForecastFileFormat = 'json' | 'csv';

export interface UploadForecastOptions {
  /** YYYY-MM-DD */
  dataVersionDate?: string;
  /** How the prediction set is encoded in the uploaded file. Defaults to 'json'. */
  format?: ForecastFileFormat;
}

const DATE_FORMAT = 'yyyy-MM-dd';

function assertDate(value: string, field: string): void {
  if (!DateTime.fromFormat(value, DATE_FORMAT, { zone: 'utc' }).isValid) {
    throw new ValidationError(`${field} must be a YYYY-MM-DD date, got '${value}'`, { field, value });
  }
}

export class Model extends Resource<ModelJson> {
  constructor(connection: Connection, uri: string, initialJson?: unknown) {
    super(connection, uri, MODEL_KIND, initialJson);
  }

  async name(): Promise<string> {
    return (await this.json()).name;
  }

  async abbreviation(): Promise<string | null> {
    return (await this.json()).abbreviation ?? null;
  }

  async teamName(): Promise<string | null> {
    return (await this.json()).team_name ?? null;
  }

  async forecasts(): Promise<Forecast[]> {
    return this.fetchChildren('forecasts/', (uri, json) => new Forecast(this.connection, uri, json));
  }

  /**
   * Unfetched proxy for a forecast known by id
   */
  forecastForId(forecastId: number): Forecast {
    return new Forecast(this.connection, `${this.connection.host}/api/forecast/${forecastId}/`);
  }

  /**
   * Upload a prediction set as a new forecast of this model.
   *
   * The returned job is uncached; poll it with refresh(). This model's
   * forecast list only shows the new forecast once the job succeeds.
   *
   * @param source - file name recorded as the forecast's source
   * @param timezeroDate - YYYY-MM-DD
   */
  async uploadForecast(
    predictionSet: PredictionSet,
    source: string,
    timezeroDate: string,
    options: UploadForecastOptions = {}
  ): Promise<UploadFileJob> {
    this.assertNotDeleted('upload a forecast');
    const format = options.format ?? 'json';
    assertDate(timezeroDate, 'timezero_date');
    if (options.dataVersionDate !== undefined) {
      assertDate(options.dataVersionDate, 'data_version_date');
    }

    const fields: Record<string, string> = { timezero_date: timezeroDate, format };
    if (options.dataVersionDate !== undefined) {
      fields.data_version_date = options.dataVersionDate;
    }

    const uri = `${this.uri}forecasts/`;
    const json = await this.connection.postMultipart(uri, fields, {
      fieldName: 'data_file',
      fileName: source,
      contentType: format === 'csv' ? 'text/csv' : 'application/json',
      content: format === 'csv' ? csvFromPredictionSet(predictionSet) : JSON.stringify(predictionSet),
    });

    const located = LocatorSchema.safeParse(json);
    if (!located.success) {
      throw new FormatError(`Upload response from ${uri} has no job url`, { uri });
    }
    return new UploadFileJob(this.connection, located.data.url);
  }
}
