/**
 * @predictkit/formats - Prediction interchange codec
 *
 * Prediction-set schemas and the conversions to and from the flat
 * 12-column row format and its CSV text.
 */

export * from './prediction-set.js';
export * from './csv-rows.js';
export * from './csv-text.js';
