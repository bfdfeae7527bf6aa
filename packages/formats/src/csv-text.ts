/**
 * Forecast CSV text
 *
 * Serializes rows to CSV text with csv-stringify and parses CSV text back
 * into typed rows with csv-parse.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { FormatError } from '@predictkit/utils';
import {
  CSV_HEADER,
  csvRowsFromPredictionSet,
  predictionSetFromCsvRows,
  type CsvCell,
  type CsvColumn,
  type CsvRow,
} from './csv-rows.js';
import type { PredictionSet } from './prediction-set.js';

const NUMBER_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

/** Columns that always hold numbers when non-empty */
const NUMERIC_COLUMNS: ReadonlySet<CsvColumn> = new Set(['prob', 'quantile', 'param1', 'param2', 'param3']);

/** Columns whose cells may be numbers, booleans or text */
const SCALAR_COLUMNS: ReadonlySet<CsvColumn> = new Set(['value', 'cat', 'sample']);

const RecordsSchema = z.array(z.array(z.string()));

/**
 * Rows to CSV text. Booleans are written as `true` / `false`.
 */
export function formatForecastCsv(rows: CsvRow[]): string {
  return stringify(rows, {
    cast: {
      boolean: (value) => (value ? 'true' : 'false'),
    },
  });
}

function castCell(raw: string, column: CsvColumn): CsvCell {
  if (raw === '') {
    return '';
  }
  if (NUMERIC_COLUMNS.has(column)) {
    return NUMBER_PATTERN.test(raw) ? Number(raw) : raw;
  }
  if (SCALAR_COLUMNS.has(column)) {
    if (NUMBER_PATTERN.test(raw)) {
      return Number(raw);
    }
    if (raw === 'true' || raw === 'false') {
      return raw === 'true';
    }
  }
  return raw;
}

/**
 * CSV text to rows. The header row is kept verbatim; data cells are cast per column.
 */
export function parseForecastCsv(text: string): CsvRow[] {
  let records: unknown;
  try {
    records = parse(text, { skip_empty_lines: true, bom: true });
  } catch (error) {
    throw new FormatError(`unreadable forecast CSV: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = RecordsSchema.safeParse(records);
  if (!parsed.success) {
    throw new FormatError('unreadable forecast CSV: expected rows of text cells');
  }

  return parsed.data.map((record, rowIndex) => {
    if (record.length !== CSV_HEADER.length) {
      throw new FormatError(
        `row ${rowIndex}: expected ${CSV_HEADER.length} columns, got ${record.length}`,
        { rowIndex }
      );
    }
    const cells = record.map((raw, i) => (rowIndex === 0 ? raw : castCell(raw, CSV_HEADER[i])));
    const [unit, target, predictionClass, value, cat, prob, sample, quantile, family, p1, p2, p3] = cells;
    const row: CsvRow = [unit, target, predictionClass, value, cat, prob, sample, quantile, family, p1, p2, p3];
    return row;
  });
}

export function csvFromPredictionSet(predictionSet: PredictionSet): string {
  return formatForecastCsv(csvRowsFromPredictionSet(predictionSet));
}

export function predictionSetFromCsv(text: string): PredictionSet {
  return predictionSetFromCsvRows(parseForecastCsv(text));
}
