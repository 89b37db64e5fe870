/**
 * Chart data computed from the detail report. Each series is the data
 * behind one dashboard chart; rendering happens in the browser.
 */
import { MissingColumnError, requireColumns, type CsvTable } from '../io/csv-reader.js';
import { INPUT_COLUMNS } from '../io/columns.js';
import { hitRate, parseCount } from '../pipeline/normalizer.js';
import { parseAttemptSequence } from '../pipeline/sequence-parser.js';
import { DEFAULT_SCORING_RULES } from '../scoring/rules.js';

export interface CountEntry {
  label: string;
  count: number;
}

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

export interface TeamSeries {
  columns: string[];
  teams: { teamNumber: number; values: Record<string, number> }[];
}

export interface Insights {
  mostCommonEndgameAction: string;
  averageMatchNumber: number | null;
  totalRecords: number;
}

const TEAM = INPUT_COLUMNS.teamNumber;
const CYCLE_COLUMNS = [INPUT_COLUMNS.totalCycles, INPUT_COLUMNS.autoCycles, INPUT_COLUMNS.teleCycles];
const HIT_RATE_COLUMNS = ['auto_hit_rate', 'tele_hit_rate'];

function toNumber(cell: string | undefined): number | null {
  if (cell === undefined || cell.trim() === '') return null;
  const num = Number(cell);
  return Number.isFinite(num) ? num : null;
}

/** Endgame labels from every row, counted. Highest count first; ties in order of first appearance. */
export function endgameFrequency(table: CsvTable): CountEntry[] {
  requireColumns(table, [INPUT_COLUMNS.endGame]);

  const counts = new Map<string, number>();
  for (const row of table.rows) {
    for (const part of (row[INPUT_COLUMNS.endGame] ?? '').split(';')) {
      const label = part.trim();
      if (label) counts.set(label, (counts.get(label) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .map(([label, count]) => ({ label, count }))
    .sort((a, b) => b.count - a.count);
}

/** Equal-width bins over the range of `total_score`. The last bin includes its upper edge. */
export function scoreHistogram(table: CsvTable, bins = 20): HistogramBin[] {
  requireColumns(table, ['total_score']);

  const values = table.rows
    .map((row) => toNumber(row['total_score']))
    .filter((v): v is number => v !== null);
  if (values.length === 0) return [];

  const min = Math.min(...values);
  const max = Math.max(...values);
  if (min === max) return [{ start: min, end: max, count: values.length }];

  const width = (max - min) / bins;
  const histogram = Array.from({ length: bins }, (_, i) => ({
    start: min + i * width,
    end: i === bins - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));
  for (const v of values) {
    const index = Math.min(Math.floor((v - min) / width), bins - 1);
    const bin = histogram[index];
    if (bin) bin.count++;
  }
  return histogram;
}

/**
 * Per-team means of `columns`, sorted descending by the first column.
 * Cells that are not numbers are left out of the mean.
 */
function teamMeans(
  table: CsvTable,
  columns: string[],
  valueOf: (row: Record<string, string>, column: string) => number | null,
): TeamSeries {
  const byTeam = new Map<number, Map<string, { sum: number; n: number }>>();

  for (const row of table.rows) {
    const team = toNumber(row[TEAM]);
    if (team === null) continue;
    let acc = byTeam.get(team);
    if (!acc) {
      acc = new Map();
      byTeam.set(team, acc);
    }
    for (const column of columns) {
      const value = valueOf(row, column);
      if (value === null) continue;
      const entry = acc.get(column) ?? { sum: 0, n: 0 };
      entry.sum += value;
      entry.n++;
      acc.set(column, entry);
    }
  }

  const [first] = columns;
  const teams = [...byTeam.entries()]
    .sort(([a], [b]) => a - b)
    .map(([teamNumber, acc]) => {
      const values: Record<string, number> = {};
      for (const column of columns) {
        const entry = acc.get(column);
        values[column] = entry && entry.n > 0 ? entry.sum / entry.n : 0;
      }
      return { teamNumber, values };
    });

  if (first !== undefined) {
    teams.sort((a, b) => (b.values[first] ?? 0) - (a.values[first] ?? 0));
  }
  return { columns, teams };
}

export function teamAverageScores(table: CsvTable): TeamSeries {
  requireColumns(table, [TEAM, 'total_score']);
  return teamMeans(table, ['total_score'], (row, column) => toNumber(row[column]));
}

export function teamCycleAverages(table: CsvTable): TeamSeries {
  requireColumns(table, [TEAM]);
  const available = CYCLE_COLUMNS.filter((c) => table.header.includes(c));
  if (available.length === 0) throw new MissingColumnError(CYCLE_COLUMNS.join(' / '));
  return teamMeans(table, available, (row, column) => toNumber(row[column]));
}

function zoneTotal(cell: string | undefined): { scored: number; attempts: number } {
  const attempts = parseAttemptSequence(cell);
  return { scored: attempts.reduce((a, b) => a + b, 0), attempts: attempts.length };
}

/**
 * Per-row hit rate for a detail file written without hit-rate columns,
 * from the raw zone cells and the recorded cycle count.
 */
function derivedHitRate(row: Record<string, string>, column: string, maxAttemptValue: number): number {
  const auto = column === 'auto_hit_rate';
  const near = zoneTotal(row[auto ? INPUT_COLUMNS.autoNear : INPUT_COLUMNS.teleNear]);
  const far = zoneTotal(row[auto ? INPUT_COLUMNS.autoFar : INPUT_COLUMNS.teleFar]);
  const cycles =
    parseCount(row[auto ? INPUT_COLUMNS.autoCycles : INPUT_COLUMNS.teleCycles]) ?? near.attempts + far.attempts;
  return hitRate(near.scored + far.scored, cycles, maxAttemptValue);
}

export function teamHitRates(
  table: CsvTable,
  maxAttemptValue = DEFAULT_SCORING_RULES.maxAttemptValue,
): TeamSeries {
  requireColumns(table, [TEAM]);
  const recorded = HIT_RATE_COLUMNS.filter((c) => table.header.includes(c));
  if (recorded.length > 0) {
    return teamMeans(table, recorded, (row, column) => toNumber(row[column]));
  }
  return teamMeans(table, HIT_RATE_COLUMNS, (row, column) => derivedHitRate(row, column, maxAttemptValue));
}

/** Most frequent label; a tie goes to the label that sorts first. */
function mostCommon(entries: CountEntry[]): string | undefined {
  const [first] = entries;
  if (!first) return undefined;
  return entries
    .filter((e) => e.count === first.count)
    .map((e) => e.label)
    .sort()[0];
}

export function insights(table: CsvTable): Insights {
  const top = table.header.includes(INPUT_COLUMNS.endGame) ? mostCommon(endgameFrequency(table)) : undefined;

  const matchNumbers = table.rows
    .map((row) => toNumber(row[INPUT_COLUMNS.matchNumber]))
    .filter((v): v is number => v !== null);
  const averageMatchNumber =
    matchNumbers.length > 0 ? matchNumbers.reduce((a, b) => a + b, 0) / matchNumbers.length : null;

  return {
    mostCommonEndgameAction: top ?? 'N/A',
    averageMatchNumber,
    totalRecords: table.rows.length,
  };
}
