import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { RawMatchRecord } from '../types/record.js';
import { INPUT_COLUMNS } from './columns.js';
import { logger } from '../utils/logger.js';

const cellsSchema = z.array(z.array(z.string()));

/** A parsed CSV file: its header and one header -> cell map per data row. */
export interface CsvTable {
  header: string[];
  rows: Record<string, string>[];
}

const KNOWN_COLUMNS = new Set<string>(Object.values(INPUT_COLUMNS));

export class MissingColumnError extends Error {
  constructor(readonly column: string) {
    super(`${column} not found in CSV.`);
    this.name = 'MissingColumnError';
  }
}

export function requireColumns(table: CsvTable, columns: string[]): void {
  for (const column of columns) {
    if (!table.header.includes(column)) throw new MissingColumnError(column);
  }
}

/** CSV files directly inside `dir`, in lexicographic file-name order. */
export function listInputFiles(dir: string): string[] {
  const entries = fs.existsSync(dir) ? fs.readdirSync(dir, { withFileTypes: true }) : [];
  const files = entries
    .filter((e) => e.isFile() && e.name.toLowerCase().endsWith('.csv'))
    .map((e) => e.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => path.join(dir, name));

  if (files.length === 0) {
    throw new Error(`No CSV files found in ${dir}`);
  }
  return files;
}

/**
 * Parses CSV text whose first line is the header. Short rows leave their
 * trailing columns out of the map; cells past the header are dropped.
 */
export function parseCsvTable(text: string): CsvTable {
  const parsed: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  const [header = [], ...body] = cellsSchema.parse(parsed);

  const rows = body.map((cells) => {
    const row: Record<string, string> = {};
    header.forEach((column, i) => {
      const cell = cells[i];
      if (cell !== undefined) row[column] = cell;
    });
    return row;
  });
  return { header, rows };
}

export function toRawRecord(row: Record<string, string>): RawMatchRecord {
  const extra: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    if (!KNOWN_COLUMNS.has(key)) extra[key] = value;
  }

  return {
    matchNumber: row[INPUT_COLUMNS.matchNumber],
    teamNumber: row[INPUT_COLUMNS.teamNumber],
    autoNear: row[INPUT_COLUMNS.autoNear],
    autoFar: row[INPUT_COLUMNS.autoFar],
    teleNear: row[INPUT_COLUMNS.teleNear],
    teleFar: row[INPUT_COLUMNS.teleFar],
    endGame: row[INPUT_COLUMNS.endGame],
    autoCycles: row[INPUT_COLUMNS.autoCycles],
    teleCycles: row[INPUT_COLUMNS.teleCycles],
    totalCycles: row[INPUT_COLUMNS.totalCycles],
    extra,
  };
}

/** Reads every file and concatenates their rows in file-then-row order. */
export function readRawRows(files: string[]): RawMatchRecord[] {
  const rows: RawMatchRecord[] = [];
  for (const file of files) {
    const { rows: parsed } = parseCsvTable(fs.readFileSync(file, 'utf-8'));
    logger.debug({ file, rows: parsed.length }, 'Scouting file read');
    for (const row of parsed) rows.push(toRawRecord(row));
  }
  return rows;
}
