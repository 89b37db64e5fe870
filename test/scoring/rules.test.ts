import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, afterAll } from 'vitest';
import { DEFAULT_SCORING_RULES, endgamePointsFor, loadScoringRules } from '../../src/scoring/rules.js';
import { makeTempDir, removeTempDirs } from '../helpers/fixture-loader.js';

afterAll(removeTempDirs);

function writeRules(content: string): string {
  const file = path.join(makeTempDir(), 'rules.json');
  fs.writeFileSync(file, content);
  return file;
}

describe('endgamePointsFor', () => {
  it('should look up the default table', () => {
    expect(endgamePointsFor('Partially', DEFAULT_SCORING_RULES)).toBe(5);
    expect(endgamePointsFor('Fully', DEFAULT_SCORING_RULES)).toBe(10);
    expect(endgamePointsFor('Double Park Beneficiary', DEFAULT_SCORING_RULES)).toBe(10);
    expect(endgamePointsFor('Double Park Dealer', DEFAULT_SCORING_RULES)).toBe(20);
  });

  it('should score empty and unknown categories as 0', () => {
    expect(endgamePointsFor('', DEFAULT_SCORING_RULES)).toBe(0);
    expect(endgamePointsFor('fully', DEFAULT_SCORING_RULES)).toBe(0);
    expect(endgamePointsFor('toString', DEFAULT_SCORING_RULES)).toBe(0);
  });
});

describe('loadScoringRules', () => {
  it('should return the defaults without a file', () => {
    expect(loadScoringRules()).toEqual(DEFAULT_SCORING_RULES);
  });

  it('should fill omitted fields with defaults', () => {
    const rules = loadScoringRules(writeRules('{ "pointsPerPiece": 4 }'));
    expect(rules).toEqual({ ...DEFAULT_SCORING_RULES, pointsPerPiece: 4 });
  });

  it('should replace the endgame table', () => {
    const rules = loadScoringRules(writeRules('{ "endgamePoints": { "Climb": 15 } }'));
    expect(rules.endgamePoints).toEqual({ Climb: 15 });
  });

  it('should reject invalid values', () => {
    const file = writeRules('{ "maxAttemptValue": 0 }');
    expect(() => loadScoringRules(file)).toThrow(`Invalid scoring rules in ${file}: maxAttemptValue`);
  });

  it('should reject malformed JSON', () => {
    const file = writeRules('{ not json');
    expect(() => loadScoringRules(file)).toThrow(`Could not read scoring rules from ${file}`);
  });

  it('should reject a missing file', () => {
    const file = path.join(makeTempDir(), 'absent.json');
    expect(() => loadScoringRules(file)).toThrow(`Could not read scoring rules from ${file}`);
  });
});
