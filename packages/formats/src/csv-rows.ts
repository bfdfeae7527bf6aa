/**
 * Prediction Set <-> Tabular Rows
 *
 * Flattens a prediction set into the fixed 12-column row format and folds
 * rows back into a prediction set. The first row is always the header.
 * Columns a prediction class does not use are left as ''.
 */

import { FormatError } from '@predictkit/utils';
import {
  isPredictionClass,
  type NamedPredictionEntry,
  type PredictionClass,
  type PredictionEntry,
  type PredictionSet,
  type Scalar,
} from './prediction-set.js';

export const CSV_HEADER = [
  'unit',
  'target',
  'class',
  'value',
  'cat',
  'prob',
  'sample',
  'quantile',
  'family',
  'param1',
  'param2',
  'param3',
] as const;

export type CsvColumn = (typeof CSV_HEADER)[number];

export type CsvCell = Scalar;

export type CsvRow = [
  unit: CsvCell,
  target: CsvCell,
  predictionClass: CsvCell,
  value: CsvCell,
  cat: CsvCell,
  prob: CsvCell,
  sample: CsvCell,
  quantile: CsvCell,
  family: CsvCell,
  param1: CsvCell,
  param2: CsvCell,
  param3: CsvCell,
];

type ClassCells = Partial<Record<Exclude<CsvColumn, 'unit' | 'target' | 'class'>, CsvCell>>;

function rowFor(entry: PredictionEntry, cells: ClassCells): CsvRow {
  return [
    entry.unit,
    entry.target,
    entry.class,
    cells.value ?? '',
    cells.cat ?? '',
    cells.prob ?? '',
    cells.sample ?? '',
    cells.quantile ?? '',
    cells.family ?? '',
    cells.param1 ?? '',
    cells.param2 ?? '',
    cells.param3 ?? '',
  ];
}

function assertNever(entry: never): never {
  throw new FormatError(`unhandled prediction entry: ${JSON.stringify(entry)}`);
}

/**
 * Rows contributed by one entry. Parallel arrays pair up to the shorter one.
 */
function rowsForEntry(entry: PredictionEntry): CsvRow[] {
  switch (entry.class) {
    case 'bin': {
      const { cat, prob } = entry.prediction;
      const count = Math.min(cat.length, prob.length);
      return Array.from({ length: count }, (_, i) => rowFor(entry, { cat: cat[i], prob: prob[i] }));
    }
    case 'named': {
      const { family, param1, param2, param3 } = entry.prediction;
      return [rowFor(entry, { family, param1, param2, param3 })];
    }
    case 'point':
      return [rowFor(entry, { value: entry.prediction.value })];
    case 'sample':
      return entry.prediction.sample.map((sample) => rowFor(entry, { sample }));
    case 'quantile': {
      const { quantile, value } = entry.prediction;
      const count = Math.min(quantile.length, value.length);
      return Array.from({ length: count }, (_, i) =>
        rowFor(entry, { quantile: quantile[i], value: value[i] })
      );
    }
    default:
      return assertNever(entry);
  }
}

/**
 * Convert a prediction set to rows, header first. The `meta` section is ignored.
 *
 * Entries are checked before any row is produced, so an unrecognized class
 * aborts the whole conversion.
 */
export function csvRowsFromPredictionSet(predictionSet: PredictionSet): CsvRow[] {
  if (!Array.isArray(predictionSet.predictions)) {
    throw new FormatError('no predictions section found in prediction set');
  }

  for (const entry of predictionSet.predictions) {
    if (!isPredictionClass(entry.class)) {
      throw new FormatError(`invalid prediction class: ${String(entry.class)}`, {
        predictionClass: entry.class,
        unit: entry.unit,
        target: entry.target,
      });
    }
  }

  const rows: CsvRow[] = [[...CSV_HEADER]];
  for (const entry of predictionSet.predictions) {
    rows.push(...rowsForEntry(entry));
  }
  return rows;
}

function isEmpty(cell: CsvCell): boolean {
  return cell === '';
}

function cellAt(row: readonly CsvCell[], column: CsvColumn): CsvCell {
  return row[CSV_HEADER.indexOf(column)];
}

function requireCell(row: readonly CsvCell[], column: CsvColumn, rowIndex: number): CsvCell {
  const cell = cellAt(row, column);
  if (isEmpty(cell)) {
    throw new FormatError(`row ${rowIndex}: column '${column}' is empty`, { rowIndex, column });
  }
  return cell;
}

function requireNumber(row: readonly CsvCell[], column: CsvColumn, rowIndex: number): number {
  const cell = requireCell(row, column, rowIndex);
  if (typeof cell === 'number') {
    return cell;
  }
  const parsed = typeof cell === 'string' && cell.trim() !== '' ? Number(cell) : NaN;
  if (!Number.isFinite(parsed)) {
    throw new FormatError(`row ${rowIndex}: column '${column}' is not a number: '${String(cell)}'`, {
      rowIndex,
      column,
    });
  }
  return parsed;
}

function optionalNumber(row: readonly CsvCell[], column: CsvColumn, rowIndex: number): number | undefined {
  return isEmpty(cellAt(row, column)) ? undefined : requireNumber(row, column, rowIndex);
}

/**
 * Add one row's elementary value to an entry of an accumulating class
 */
function appendRow(entry: PredictionEntry, row: readonly CsvCell[], rowIndex: number): void {
  switch (entry.class) {
    case 'bin':
      entry.prediction.cat.push(requireCell(row, 'cat', rowIndex));
      entry.prediction.prob.push(requireNumber(row, 'prob', rowIndex));
      return;
    case 'sample':
      entry.prediction.sample.push(requireCell(row, 'sample', rowIndex));
      return;
    case 'quantile':
      entry.prediction.quantile.push(requireNumber(row, 'quantile', rowIndex));
      entry.prediction.value.push(requireCell(row, 'value', rowIndex));
      return;
    case 'named':
    case 'point':
      throw new FormatError(
        `row ${rowIndex}: duplicate ${entry.class} prediction for unit '${entry.unit}', target '${entry.target}'`,
        { rowIndex, unit: entry.unit, target: entry.target }
      );
    default:
      assertNever(entry);
  }
}

function entryFromRow(
  unit: string,
  target: string,
  predictionClass: PredictionClass,
  row: readonly CsvCell[],
  rowIndex: number
): PredictionEntry {
  switch (predictionClass) {
    case 'bin':
      return withFirstRow({ unit, target, class: 'bin', prediction: { cat: [], prob: [] } }, row, rowIndex);
    case 'sample':
      return withFirstRow({ unit, target, class: 'sample', prediction: { sample: [] } }, row, rowIndex);
    case 'quantile':
      return withFirstRow(
        { unit, target, class: 'quantile', prediction: { quantile: [], value: [] } },
        row,
        rowIndex
      );
    case 'point':
      return { unit, target, class: 'point', prediction: { value: requireCell(row, 'value', rowIndex) } };
    case 'named': {
      const prediction: NamedPredictionEntry['prediction'] = {
        family: String(requireCell(row, 'family', rowIndex)),
      };
      for (const column of ['param1', 'param2', 'param3'] as const) {
        const param = optionalNumber(row, column, rowIndex);
        if (param !== undefined) {
          prediction[column] = param;
        }
      }
      return { unit, target, class: 'named', prediction };
    }
  }
}

function withFirstRow(entry: PredictionEntry, row: readonly CsvCell[], rowIndex: number): PredictionEntry {
  appendRow(entry, row, rowIndex);
  return entry;
}

/**
 * Fold rows (header first) back into a prediction set.
 *
 * Rows are grouped by (unit, target, class) in first-appearance order:
 * bin, sample and quantile rows accumulate into one entry, while a second
 * named or point row for the same unit and target is rejected.
 */
export function predictionSetFromCsvRows(rows: readonly (readonly CsvCell[])[]): PredictionSet {
  const [header, ...dataRows] = rows;
  if (
    !header ||
    header.length !== CSV_HEADER.length ||
    header.some((cell, i) => cell !== CSV_HEADER[i])
  ) {
    throw new FormatError(`invalid header: expected ${CSV_HEADER.join(',')}`, {
      actual: header ? header.map(String).join(',') : null,
    });
  }

  const predictions: PredictionEntry[] = [];
  const entriesByKey = new Map<string, PredictionEntry>();

  dataRows.forEach((row, i) => {
    const rowIndex = i + 1;
    if (row.length !== CSV_HEADER.length) {
      throw new FormatError(
        `row ${rowIndex}: expected ${CSV_HEADER.length} columns, got ${row.length}`,
        { rowIndex }
      );
    }

    const predictionClass = cellAt(row, 'class');
    if (!isPredictionClass(predictionClass)) {
      throw new FormatError(`invalid prediction class: ${String(predictionClass)}`, {
        predictionClass,
        rowIndex,
      });
    }
    const unit = String(requireCell(row, 'unit', rowIndex));
    const target = String(requireCell(row, 'target', rowIndex));

    const key = JSON.stringify([unit, target, predictionClass]);
    const existing = entriesByKey.get(key);
    if (existing) {
      appendRow(existing, row, rowIndex);
      return;
    }

    const entry = entryFromRow(unit, target, predictionClass, row, rowIndex);
    entriesByKey.set(key, entry);
    predictions.push(entry);
  });

  return { predictions };
}
