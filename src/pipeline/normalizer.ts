import type { NormalizedMatchRecord, RawMatchRecord, ZoneValues } from '../types/record.js';
import type { ScoringRules } from '../types/scoring.js';
import { endgamePointsFor } from '../scoring/rules.js';
import { parseAttemptSequence, parseDecimal } from './sequence-parser.js';
import { logger } from '../utils/logger.js';

/** Non-negative integer value of a cell, or null when it cannot be read as one. */
export function parseCount(value: string | undefined): number | null {
  if (value === undefined) return null;
  const num = parseDecimal(value);
  if (num === null || num < 0) return null;
  return Math.trunc(num);
}

/**
 * Only the first label of a multi-select endgame answer is scored;
 * later labels are ignored.
 */
export function selectEndgameCategory(value: string | undefined): string {
  if (!value) return '';
  for (const part of value.split(';')) {
    const label = part.trim();
    if (label) return label;
  }
  return '';
}

function sum(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

/** Shortfall against a full-value attempt. Values above the maximum go negative. */
function offTargetFor(attempts: readonly number[], maxAttemptValue: number): number {
  return attempts.reduce((acc, value) => acc + (maxAttemptValue - value), 0);
}

export function hitRate(scored: number, cycles: number, maxAttemptValue: number): number {
  const possible = cycles * maxAttemptValue;
  return possible === 0 ? 0 : scored / possible;
}

export function normalizeRecord(raw: RawMatchRecord, rules: ScoringRules): NormalizedMatchRecord {
  const attempts: ZoneValues<number[]> = {
    autoNear: parseAttemptSequence(raw.autoNear),
    autoFar: parseAttemptSequence(raw.autoFar),
    teleNear: parseAttemptSequence(raw.teleNear),
    teleFar: parseAttemptSequence(raw.teleFar),
  };

  const zoneScores: ZoneValues<number> = {
    autoNear: sum(attempts.autoNear),
    autoFar: sum(attempts.autoFar),
    teleNear: sum(attempts.teleNear),
    teleFar: sum(attempts.teleFar),
  };

  const autoAttempts = [...attempts.autoNear, ...attempts.autoFar];
  const teleAttempts = [...attempts.teleNear, ...attempts.teleFar];

  const autoCycles = parseCount(raw.autoCycles) ?? autoAttempts.length;
  const teleCycles = parseCount(raw.teleCycles) ?? teleAttempts.length;
  const totalCycles = parseCount(raw.totalCycles) ?? autoCycles + teleCycles;

  const endgameCategory = selectEndgameCategory(raw.endGame);
  const endgameScore = endgamePointsFor(endgameCategory, rules);
  const pieceScore =
    (zoneScores.autoNear + zoneScores.autoFar + zoneScores.teleNear + zoneScores.teleFar) *
    rules.pointsPerPiece;

  return {
    raw,
    matchNumber: parseCount(raw.matchNumber) ?? 0,
    teamNumber: parseCount(raw.teamNumber) ?? 0,
    attempts,
    zoneScores,
    offTarget: {
      auto: offTargetFor(autoAttempts, rules.maxAttemptValue),
      tele: offTargetFor(teleAttempts, rules.maxAttemptValue),
    },
    cycles: { auto: autoCycles, tele: teleCycles, total: totalCycles },
    hitRates: {
      auto: hitRate(zoneScores.autoNear + zoneScores.autoFar, autoCycles, rules.maxAttemptValue),
      tele: hitRate(zoneScores.teleNear + zoneScores.teleFar, teleCycles, rules.maxAttemptValue),
    },
    endgameCategory,
    endgameScore,
    pieceScore,
    totalScore: pieceScore + endgameScore,
  };
}

/**
 * Normalizes every row in input order. Rows with unreadable identifiers are
 * kept with the identifier set to 0, so the output length always matches.
 */
export function normalizeRecords(rows: RawMatchRecord[], rules: ScoringRules): NormalizedMatchRecord[] {
  let defaultedIds = 0;

  const records = rows.map((raw) => {
    if (parseCount(raw.matchNumber) === null || parseCount(raw.teamNumber) === null) {
      defaultedIds++;
    }
    return normalizeRecord(raw, rules);
  });

  if (defaultedIds > 0) {
    logger.warn({ rows: defaultedIds }, 'Rows with unreadable match or team number defaulted to 0');
  }
  logger.debug({ rows: records.length }, 'Records normalized');
  return records;
}
