import fs from 'node:fs';
import { z } from 'zod';
import type { ScoringRules } from '../types/scoring.js';

export const DEFAULT_SCORING_RULES: ScoringRules = {
  pointsPerPiece: 3,
  maxAttemptValue: 3,
  endgamePoints: {
    Partially: 5,
    Fully: 10,
    'Double Park Beneficiary': 10,
    'Double Park Dealer': 20,
  },
};

const rulesSchema = z.object({
  pointsPerPiece: z.number().nonnegative().default(DEFAULT_SCORING_RULES.pointsPerPiece),
  maxAttemptValue: z.number().positive().default(DEFAULT_SCORING_RULES.maxAttemptValue),
  endgamePoints: z.record(z.string(), z.number()).default(DEFAULT_SCORING_RULES.endgamePoints),
});

/**
 * Loads scoring rules from a JSON file. Omitted fields keep their defaults;
 * a file that does not parse or validate is fatal.
 */
export function loadScoringRules(filePath?: string): ScoringRules {
  if (!filePath) return DEFAULT_SCORING_RULES;

  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Could not read scoring rules from ${filePath}: ${reason}`);
  }

  const result = rulesSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`Invalid scoring rules in ${filePath}: ${issues.join('; ')}`);
  }
  return result.data;
}

/** Bonus points for an endgame category; unknown or empty categories score 0. */
export function endgamePointsFor(category: string, rules: ScoringRules): number {
  if (!Object.hasOwn(rules.endgamePoints, category)) return 0;
  return rules.endgamePoints[category] ?? 0;
}
