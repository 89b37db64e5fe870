import fs from 'node:fs';
import path from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { NormalizedMatchRecord } from '../types/record.js';
import type { TeamSummary } from '../types/summary.js';
import {
  DETAIL_DERIVED_COLUMNS,
  DETAIL_FILE,
  INPUT_COLUMNS,
  SUMMARY_COLUMNS,
  SUMMARY_FILE,
} from './columns.js';

const DETAIL_LEADING_COLUMNS = [
  INPUT_COLUMNS.matchNumber,
  INPUT_COLUMNS.teamNumber,
  INPUT_COLUMNS.autoNear,
  INPUT_COLUMNS.autoFar,
  INPUT_COLUMNS.teleNear,
  INPUT_COLUMNS.teleFar,
  INPUT_COLUMNS.endGame,
];

/** Input values under these names are replaced by the recomputed ones. */
const DERIVED_NAMES = new Set<string>(DETAIL_DERIVED_COLUMNS);

function num(value: number): string {
  return String(value);
}

function summaryRow(s: TeamSummary): string[] {
  return [
    s.teamNumber,
    s.matches,
    s.autoNearAvg,
    s.autoFarAvg,
    s.teleNearAvg,
    s.teleFarAvg,
    s.autoCyclesAvg,
    s.teleCyclesAvg,
    s.totalCyclesAvg,
    s.autoHitRate,
    s.teleHitRate,
    s.endScoreAvg,
    s.totalScoreAvg,
    s.autoNearSum,
    s.autoFarSum,
    s.teleNearSum,
    s.teleFarSum,
    s.autoCyclesSum,
    s.teleCyclesSum,
    s.totalCyclesSum,
    s.endScoreSum,
    s.totalScoreSum,
  ].map(num);
}

export function serializeSummary(summaries: TeamSummary[]): string {
  return stringify([[...SUMMARY_COLUMNS], ...summaries.map(summaryRow)]);
}

/** Extra input columns across all records, in first-seen order. */
function collectExtraColumns(records: NormalizedMatchRecord[]): string[] {
  const seen = new Set<string>();
  for (const r of records) {
    for (const key of Object.keys(r.raw.extra)) {
      if (!DERIVED_NAMES.has(key)) seen.add(key);
    }
  }
  return [...seen];
}

function detailRow(r: NormalizedMatchRecord, extraColumns: string[]): string[] {
  return [
    num(r.matchNumber),
    num(r.teamNumber),
    r.raw.autoNear ?? '',
    r.raw.autoFar ?? '',
    r.raw.teleNear ?? '',
    r.raw.teleFar ?? '',
    r.raw.endGame ?? '',
    ...extraColumns.map((c) => r.raw.extra[c] ?? ''),
    r.attempts.autoNear.join(','),
    r.attempts.autoFar.join(','),
    r.attempts.teleNear.join(','),
    r.attempts.teleFar.join(','),
    num(r.zoneScores.autoNear),
    num(r.zoneScores.autoFar),
    num(r.zoneScores.teleNear),
    num(r.zoneScores.teleFar),
    num(r.offTarget.auto),
    num(r.offTarget.tele),
    num(r.cycles.auto),
    num(r.cycles.tele),
    num(r.cycles.total),
    num(r.hitRates.auto),
    num(r.hitRates.tele),
    r.endgameCategory,
    num(r.endgameScore),
    num(r.pieceScore),
    num(r.totalScore),
  ];
}

export function serializeDetail(records: NormalizedMatchRecord[]): string {
  const extraColumns = collectExtraColumns(records);
  const header = [...DETAIL_LEADING_COLUMNS, ...extraColumns, ...DETAIL_DERIVED_COLUMNS];
  return stringify([header, ...records.map((r) => detailRow(r, extraColumns))]);
}

export interface ReportPaths {
  summaryPath: string;
  detailPath: string;
}

/**
 * Writes both reports through temp files in `outputDir`. Every temp file is
 * written before any report is replaced, and leftovers are removed on failure.
 */
export function writeReports(outputDir: string, summaryCsv: string, detailCsv: string): ReportPaths {
  fs.mkdirSync(outputDir, { recursive: true });
  const summaryPath = path.join(outputDir, SUMMARY_FILE);
  const detailPath = path.join(outputDir, DETAIL_FILE);

  const staged = [
    { target: detailPath, content: detailCsv },
    { target: summaryPath, content: summaryCsv },
  ].map((file) => ({ ...file, temp: `${file.target}.${process.pid}.tmp` }));

  try {
    for (const file of staged) fs.writeFileSync(file.temp, file.content);
    for (const file of staged) fs.renameSync(file.temp, file.target);
  } finally {
    for (const file of staged) fs.rmSync(file.temp, { force: true });
  }
  return { summaryPath, detailPath };
}
