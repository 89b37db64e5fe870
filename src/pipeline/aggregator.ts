import type { NormalizedMatchRecord } from '../types/record.js';
import type { ScoringRules } from '../types/scoring.js';
import type { TeamSummary } from '../types/summary.js';
import { hitRate } from './normalizer.js';

interface TeamTotals {
  matchNumbers: Set<number>;
  autoNear: number;
  autoFar: number;
  teleNear: number;
  teleFar: number;
  autoCycles: number;
  teleCycles: number;
  totalCycles: number;
  endScore: number;
  totalScore: number;
}

function emptyTotals(): TeamTotals {
  return {
    matchNumbers: new Set(),
    autoNear: 0,
    autoFar: 0,
    teleNear: 0,
    teleFar: 0,
    autoCycles: 0,
    teleCycles: 0,
    totalCycles: 0,
    endScore: 0,
    totalScore: 0,
  };
}

/**
 * One summary per team, ascending by team number.
 *
 * `matches` counts distinct match numbers, while sums include every row:
 * a duplicate submission for the same match adds to the sums but not to
 * the denominator.
 */
export function summarizeTeams(records: NormalizedMatchRecord[], rules: ScoringRules): TeamSummary[] {
  const byTeam = new Map<number, TeamTotals>();

  for (const r of records) {
    let totals = byTeam.get(r.teamNumber);
    if (!totals) {
      totals = emptyTotals();
      byTeam.set(r.teamNumber, totals);
    }
    totals.matchNumbers.add(r.matchNumber);
    totals.autoNear += r.zoneScores.autoNear;
    totals.autoFar += r.zoneScores.autoFar;
    totals.teleNear += r.zoneScores.teleNear;
    totals.teleFar += r.zoneScores.teleFar;
    totals.autoCycles += r.cycles.auto;
    totals.teleCycles += r.cycles.tele;
    totals.totalCycles += r.cycles.total;
    totals.endScore += r.endgameScore;
    totals.totalScore += r.totalScore;
  }

  return [...byTeam.entries()]
    .sort(([a], [b]) => a - b)
    .map(([teamNumber, t]) => {
      // A group exists only because at least one record landed in it.
      const matches = t.matchNumbers.size;
      return {
        teamNumber,
        matches,
        autoNearSum: t.autoNear,
        autoFarSum: t.autoFar,
        teleNearSum: t.teleNear,
        teleFarSum: t.teleFar,
        autoCyclesSum: t.autoCycles,
        teleCyclesSum: t.teleCycles,
        totalCyclesSum: t.totalCycles,
        endScoreSum: t.endScore,
        totalScoreSum: t.totalScore,
        autoNearAvg: t.autoNear / matches,
        autoFarAvg: t.autoFar / matches,
        teleNearAvg: t.teleNear / matches,
        teleFarAvg: t.teleFar / matches,
        autoCyclesAvg: t.autoCycles / matches,
        teleCyclesAvg: t.teleCycles / matches,
        totalCyclesAvg: t.totalCycles / matches,
        autoHitRate: hitRate(t.autoNear + t.autoFar, t.autoCycles, rules.maxAttemptValue),
        teleHitRate: hitRate(t.teleNear + t.teleFar, t.teleCycles, rules.maxAttemptValue),
        endScoreAvg: t.endScore / matches,
        totalScoreAvg: t.totalScore / matches,
      };
    });
}
