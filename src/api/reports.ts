import fs from 'node:fs';
import path from 'node:path';
import { createHash } from 'node:crypto';
import { DETAIL_FILE, SUMMARY_FILE } from '../io/columns.js';

export type ReportKind = 'summary' | 'detail';

const FILES: Record<ReportKind, string> = {
  summary: SUMMARY_FILE,
  detail: DETAIL_FILE,
};

export function reportPath(reportsDir: string, kind: ReportKind): string {
  return path.join(reportsDir, FILES[kind]);
}

/** Report text, or null when the pipeline has not written it yet. */
export function readReport(reportsDir: string, kind: ReportKind): string | null {
  const file = reportPath(reportsDir, kind);
  return fs.existsSync(file) ? fs.readFileSync(file, 'utf-8') : null;
}

export function computeETag(data: unknown): string {
  const hash = createHash('md5').update(JSON.stringify(data)).digest('hex');
  return `"${hash}"`;
}
