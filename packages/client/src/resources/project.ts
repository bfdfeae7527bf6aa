import { z } from 'zod';
import { FormatError, ValidationError } from '@predictkit/utils';
import type { Connection } from '../connection.js';
import { Model } from './model.js';
import { Resource, type ResourceKind } from './resource.js';
import { ProjectSchema, type ProjectJson } from './schemas.js';
import { Target } from './target.js';
import { TimeZero } from './timezero.js';
import { Unit } from './unit.js';

export const PROJECT_KIND: ResourceKind<ProjectJson> = {
  name: 'Project',
  schema: ProjectSchema,
  displayKeys: ['name', 'is_public'],
};

export const MODEL_CONFIG_KEYS = [
  'name',
  'abbreviation',
  'team_name',
  'description',
  'home_url',
  'aux_data_url',
] as const;

export type ModelConfigKey = (typeof MODEL_CONFIG_KEYS)[number];

/** Values are passed to the server as given; only the key set is checked */
export type ModelConfig = Record<ModelConfigKey, unknown>;

const CreatedModelSchema = z
  .object({ url: z.string().min(1).optional(), id: z.number().int().optional() })
  .passthrough();

/**
 * A model configuration must carry exactly the six model fields.
 */
export function validateModelConfig(config: Readonly<Record<string, unknown>>): ModelConfig {
  const actual = Object.keys(config).sort();
  const expected = [...MODEL_CONFIG_KEYS].sort();
  if (actual.length !== expected.length || actual.some((key, i) => key !== expected[i])) {
    throw new ValidationError(
      `Wrong keys in model config. expected=${expected.join(',')}, actual=${actual.join(',')}`,
      { expected, actual }
    );
  }

  return {
    name: config.name,
    abbreviation: config.abbreviation,
    team_name: config.team_name,
    description: config.description,
    home_url: config.home_url,
    aux_data_url: config.aux_data_url,
  };
}

/**
 * A forecasting project: the entry point to its models, units, targets and time zeros
 */
export class Project extends Resource<ProjectJson> {
  constructor(connection: Connection, uri: string, initialJson?: unknown) {
    super(connection, uri, PROJECT_KIND, initialJson);
  }

  async name(): Promise<string> {
    return (await this.json()).name;
  }

  async isPublic(): Promise<boolean> {
    return (await this.json()).is_public;
  }

  async description(): Promise<string> {
    return (await this.json()).description ?? '';
  }

  async models(): Promise<Model[]> {
    return this.fetchChildren('models/', (uri, json) => new Model(this.connection, uri, json));
  }

  async units(): Promise<Unit[]> {
    return this.fetchChildren('units/', (uri, json) => new Unit(this.connection, uri, json));
  }

  async targets(): Promise<Target[]> {
    return this.fetchChildren('targets/', (uri, json) => new Target(this.connection, uri, json));
  }

  async timezeros(): Promise<TimeZero[]> {
    return this.fetchChildren('timezeros/', (uri, json) => new TimeZero(this.connection, uri, json));
  }

  /**
   * Create a model in this project. The config is checked before any request is made.
   *
   * The project's model list is not refreshed; call models() again to see the new model.
   */
  async createModel(config: Readonly<Record<string, unknown>>): Promise<Model> {
    const modelConfig = validateModelConfig(config);
    this.assertNotDeleted('create a model');

    const json = await this.connection.postJson(`${this.uri}models/`, { model_config: modelConfig });
    const created = CreatedModelSchema.safeParse(json);
    if (!created.success) {
      throw new FormatError(`Malformed create-model response from ${this.uri}models/`, { uri: this.uri });
    }

    const { url, id } = created.data;
    if (url === undefined && id === undefined) {
      throw new FormatError(`Create-model response from ${this.uri}models/ has neither url nor id`, {
        uri: this.uri,
      });
    }
    const modelUri = url ?? `${this.connection.host}/api/model/${id}/`;
    return new Model(this.connection, modelUri, json);
  }
}
