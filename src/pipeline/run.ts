import type { ScoringRules } from '../types/scoring.js';
import { listInputFiles, readRawRows } from '../io/csv-reader.js';
import { serializeDetail, serializeSummary, writeReports } from '../io/csv-writer.js';
import { normalizeRecords } from './normalizer.js';
import { summarizeTeams } from './aggregator.js';
import { logger } from '../utils/logger.js';

export interface PipelineOptions {
  inputDir: string;
  outputDir: string;
  rules: ScoringRules;
}

export interface PipelineResult {
  files: string[];
  rows: number;
  teams: number;
  summaryPath: string;
  detailPath: string;
}

/** One batch pass: read every input file, score, aggregate, write both reports. */
export function runPipeline({ inputDir, outputDir, rules }: PipelineOptions): PipelineResult {
  const files = listInputFiles(inputDir);
  logger.info({ inputDir, files: files.length }, 'Scouting files found');

  const rows = readRawRows(files);
  const records = normalizeRecords(rows, rules);
  const summaries = summarizeTeams(records, rules);

  const summaryCsv = serializeSummary(summaries);
  const detailCsv = serializeDetail(records);
  const { summaryPath, detailPath } = writeReports(outputDir, summaryCsv, detailCsv);

  logger.info({ rows: records.length, teams: summaries.length, summaryPath, detailPath }, 'Reports written');
  return { files, rows: records.length, teams: summaries.length, summaryPath, detailPath };
}
