import { parseCsvTable, requireColumns, type CsvTable } from '../io/csv-reader.js';
import { logger } from '../utils/logger.js';

const RANK_COLUMN = 'Rank';
const SORT_COLUMN = 'total_score_avg';

const DISPLAY_COLUMNS = [
  RANK_COLUMN,
  'Team Number',
  'matches',
  'auto_near_avg',
  'auto_far_avg',
  'tele_near_avg',
  'tele_far_avg',
  'auto_cycles_avg',
  'tele_cycles_avg',
  'total_cycles_avg',
  'auto_hit_rate',
  'tele_hit_rate',
  'end_score_avg',
  SORT_COLUMN,
] as const;

const DISPLAY_NAMES: Record<string, string> = {
  'Team Number': 'Team',
  matches: 'Played',
  auto_near_avg: 'Auto Near AVG',
  auto_far_avg: 'Auto Far AVG',
  tele_near_avg: 'Tele Near AVG',
  tele_far_avg: 'Tele Far AVG',
  auto_cycles_avg: 'Auto Cycles AVG',
  tele_cycles_avg: 'Tele Cycles AVG',
  total_cycles_avg: 'Total Cycles AVG',
  auto_hit_rate: 'Auto Hit Rate',
  tele_hit_rate: 'Tele Hit Rate',
  end_score_avg: 'End AVG',
  total_score_avg: 'Total AVG',
};

const PERCENT_COLUMNS = new Set(['auto_hit_rate', 'tele_hit_rate']);

export type RankingCell = string | number;

export interface RankingTable {
  columns: string[];
  rows: Record<string, RankingCell>[];
  warnings: string[];
}

function toNumber(cell: string | undefined): number | null {
  if (cell === undefined || cell.trim() === '') return null;
  const num = Number(cell);
  return Number.isFinite(num) ? num : null;
}

export function formatPercent(cell: string | undefined): string {
  const num = toNumber(cell);
  return num === null ? 'N/A' : `${(num * 100).toFixed(2)}%`;
}

function displayCell(column: string, cell: string | undefined): RankingCell {
  if (PERCENT_COLUMNS.has(column)) return formatPercent(cell);
  return toNumber(cell) ?? cell ?? '';
}

/**
 * Orders summary rows by `total_score_avg` descending and numbers them.
 * Ties keep their summary order; unreadable scores sort last.
 */
export function rankRows(table: CsvTable): Record<string, string>[] {
  requireColumns(table, [SORT_COLUMN]);

  const score = (row: Record<string, string>) => toNumber(row[SORT_COLUMN]) ?? -Infinity;
  return [...table.rows]
    .sort((a, b) => score(b) - score(a) || 0)
    .map((row, i) => ({ ...row, [RANK_COLUMN]: String(i + 1) }));
}

/** The ranking table as displayed: ranked, trimmed to display columns, renamed. */
export function buildRanking(summaryCsv: string): RankingTable {
  const table = parseCsvTable(summaryCsv);
  const ranked = rankRows(table);

  const present = new Set([RANK_COLUMN, ...table.header]);
  const available = DISPLAY_COLUMNS.filter((c) => present.has(c));
  const missing = DISPLAY_COLUMNS.filter((c) => !present.has(c));

  const warnings: string[] = [];
  if (missing.length > 0) {
    const warning = `Some columns missing (may be from old data format): ${missing.join(', ')}`;
    logger.warn({ missing }, 'Ranking summary is missing display columns');
    warnings.push(warning);
  }

  const rows = ranked.map((row) => {
    const out: Record<string, RankingCell> = {};
    for (const column of available) {
      out[DISPLAY_NAMES[column] ?? column] = displayCell(column, row[column]);
    }
    return out;
  });

  return { columns: available.map((c) => DISPLAY_NAMES[c] ?? c), rows, warnings };
}
