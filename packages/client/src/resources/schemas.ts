/**
 * Snapshot schemas for each resource kind.
 *
 * Objects pass unknown fields through: the server may add fields freely,
 * but a missing or mistyped field an accessor relies on is a FormatError.
 */

import { z } from 'zod';

export const ProjectSchema = z
  .object({
    name: z.string(),
    is_public: z.boolean(),
    description: z.string().nullable().optional(),
  })
  .passthrough();

export type ProjectJson = z.infer<typeof ProjectSchema>;

export const ModelSchema = z
  .object({
    name: z.string(),
    abbreviation: z.string().nullable().optional(),
    team_name: z.string().nullable().optional(),
  })
  .passthrough();

export type ModelJson = z.infer<typeof ModelSchema>;

export const ForecastSchema = z
  .object({
    source: z.string(),
    created_at: z.string(),
    // a URI, or an embedded object carrying one
    time_zero: z.union([z.string(), z.object({ url: z.string() }).passthrough()]),
    forecast_data: z.string(),
  })
  .passthrough();

export type ForecastJson = z.infer<typeof ForecastSchema>;

export const UnitSchema = z
  .object({
    name: z.string(),
  })
  .passthrough();

export type UnitJson = z.infer<typeof UnitSchema>;

export const TargetSchema = z
  .object({
    name: z.string(),
    type: z.string(),
    is_step_ahead: z.boolean(),
    step_ahead_increment: z.number().int().nullable(),
    unit: z.string().nullable(),
  })
  .passthrough();

export type TargetJson = z.infer<typeof TargetSchema>;

export const TimeZeroSchema = z
  .object({
    timezero_date: z.string(),
    data_version_date: z.string().nullable(),
    is_season_start: z.boolean(),
    season_name: z.string().nullable(),
  })
  .passthrough();

export type TimeZeroJson = z.infer<typeof TimeZeroSchema>;

export const UploadFileJobSchema = z
  .object({
    status: z.number().int(),
    output_json: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();

export type UploadFileJobJson = z.infer<typeof UploadFileJobSchema>;

/** The part of any list element or create/upload response that locates a resource */
export const LocatorSchema = z.object({ url: z.string().min(1) }).passthrough();
