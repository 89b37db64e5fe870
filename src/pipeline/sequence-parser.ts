import type { AttemptField } from '../types/record.js';

const NON_NEGATIVE_INT = /^\d+$/;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Plain decimal cell text as a number. Hex, binary, octal, exponent and
 * `Infinity` spellings are not scouting values and read as null.
 */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  return DECIMAL.test(trimmed) ? Number(trimmed) : null;
}

/**
 * Decides which encoding a zone cell uses. A comma marks a per-attempt
 * sequence; anything else is read as a legacy aggregate count.
 */
export function classifyAttemptField(value: string | number | null | undefined): AttemptField {
  if (value === null || value === undefined) return { kind: 'absent' };

  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'legacy', total: Math.trunc(value) } : { kind: 'absent' };
  }

  const text = value.trim();
  if (!text) return { kind: 'absent' };

  if (text.includes(',')) {
    const attempts = text
      .split(',')
      .map((token) => token.trim())
      .filter((token) => NON_NEGATIVE_INT.test(token))
      .map((token) => parseInt(token, 10));
    return { kind: 'sequence', attempts };
  }

  const num = parseDecimal(text);
  return num === null ? { kind: 'absent' } : { kind: 'legacy', total: Math.trunc(num) };
}

/** Canonical attempt list: a legacy count becomes one attempt worth the whole count. */
export function resolveAttempts(field: AttemptField): number[] {
  switch (field.kind) {
    case 'absent':
      return [];
    case 'legacy':
      return field.total > 0 ? [field.total] : [];
    case 'sequence':
      return [...field.attempts];
  }
}

export function parseAttemptSequence(value: string | number | null | undefined): number[] {
  return resolveAttempts(classifyAttemptField(value));
}
