/**
 * Prediction Set Schemas
 *
 * Zod schemas and inferred types for the hierarchical prediction-set
 * interchange structure. Each prediction entry is a closed tagged union
 * over its `class` field.
 */

import { z } from 'zod';
import { FormatError } from '@predictkit/utils';

export const PREDICTION_CLASSES = ['bin', 'named', 'point', 'sample', 'quantile'] as const;

export type PredictionClass = (typeof PREDICTION_CLASSES)[number];

export function isPredictionClass(value: unknown): value is PredictionClass {
  return typeof value === 'string' && (PREDICTION_CLASSES as readonly string[]).includes(value);
}

/**
 * A predicted value or bin category: numeric, textual (including dates) or boolean
 */
export const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export type Scalar = z.infer<typeof ScalarSchema>;

export const BinPredictionSchema = z.object({
  cat: z.array(ScalarSchema),
  prob: z.array(z.number()),
});

export const NamedPredictionSchema = z.object({
  family: z.string().min(1),
  param1: z.number().optional(),
  param2: z.number().optional(),
  param3: z.number().optional(),
});

export const PointPredictionSchema = z.object({
  value: ScalarSchema,
});

export const SamplePredictionSchema = z.object({
  sample: z.array(ScalarSchema),
});

export const QuantilePredictionSchema = z.object({
  quantile: z.array(z.number()),
  value: z.array(ScalarSchema),
});

const entryKeys = {
  unit: z.string(),
  target: z.string(),
};

export const PredictionEntrySchema = z.discriminatedUnion('class', [
  z.object({ ...entryKeys, class: z.literal('bin'), prediction: BinPredictionSchema }),
  z.object({ ...entryKeys, class: z.literal('named'), prediction: NamedPredictionSchema }),
  z.object({ ...entryKeys, class: z.literal('point'), prediction: PointPredictionSchema }),
  z.object({ ...entryKeys, class: z.literal('sample'), prediction: SamplePredictionSchema }),
  z.object({ ...entryKeys, class: z.literal('quantile'), prediction: QuantilePredictionSchema }),
]);

export type PredictionEntry = z.infer<typeof PredictionEntrySchema>;

export type BinPredictionEntry = Extract<PredictionEntry, { class: 'bin' }>;
export type NamedPredictionEntry = Extract<PredictionEntry, { class: 'named' }>;
export type PointPredictionEntry = Extract<PredictionEntry, { class: 'point' }>;
export type SamplePredictionEntry = Extract<PredictionEntry, { class: 'sample' }>;
export type QuantilePredictionEntry = Extract<PredictionEntry, { class: 'quantile' }>;

export const PredictionSetSchema = z.object({
  meta: z.record(z.unknown()).optional(),
  predictions: z.array(PredictionEntrySchema),
});

export type PredictionSet = z.infer<typeof PredictionSetSchema>;

const ClassProbeSchema = z.object({
  predictions: z.array(z.object({ class: z.unknown() }).passthrough()),
});

/**
 * Validate an untyped JSON value (e.g. a forecast data download) into a PredictionSet.
 *
 * An unrecognized prediction class is reported by name before any other
 * schema problem, so the caller sees the offending class rather than a
 * discriminator mismatch.
 */
export function parsePredictionSet(json: unknown): PredictionSet {
  const probe = ClassProbeSchema.safeParse(json);
  if (!probe.success) {
    throw new FormatError('no predictions section found in prediction set');
  }

  probe.data.predictions.forEach((entry, index) => {
    if (!isPredictionClass(entry.class)) {
      throw new FormatError(`invalid prediction class: ${String(entry.class)}`, {
        predictionClass: entry.class,
        index,
      });
    }
  });

  const result = PredictionSetSchema.safeParse(json);
  if (!result.success) {
    throw new FormatError(
      `invalid prediction set: ${result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
      { issues: result.error.issues.length }
    );
  }
  return result.data;
}
