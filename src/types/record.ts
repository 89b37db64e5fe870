export type Zone = 'autoNear' | 'autoFar' | 'teleNear' | 'teleFar';
export type Phase = 'auto' | 'tele';

/** One scouting submission as read from a CSV row. Values are untouched cell text. */
export interface RawMatchRecord {
  matchNumber: string | undefined;
  teamNumber: string | undefined;
  autoNear: string | undefined;
  autoFar: string | undefined;
  teleNear: string | undefined;
  teleFar: string | undefined;
  endGame: string | undefined;
  autoCycles: string | undefined;
  teleCycles: string | undefined;
  totalCycles: string | undefined;
  /** Every other column of the row, keyed by header. */
  extra: Record<string, string>;
}

export type ZoneValues<T> = Record<Zone, T>;
export type PhaseValues<T> = Record<Phase, T>;

/** A raw row plus everything derived from it. Never merged across rows. */
export interface NormalizedMatchRecord {
  readonly raw: RawMatchRecord;
  readonly matchNumber: number;
  readonly teamNumber: number;
  readonly attempts: Readonly<ZoneValues<readonly number[]>>;
  readonly zoneScores: Readonly<ZoneValues<number>>;
  readonly offTarget: Readonly<PhaseValues<number>>;
  readonly cycles: Readonly<PhaseValues<number> & { total: number }>;
  readonly hitRates: Readonly<PhaseValues<number>>;
  /** First endgame label only; '' when none was given. */
  readonly endgameCategory: string;
  readonly endgameScore: number;
  readonly pieceScore: number;
  readonly totalScore: number;
}

/**
 * A zone cell resolved to one of its two encodings. Older scouting forms
 * recorded a single count; newer ones record each attempt's points.
 */
export type AttemptField =
  | { kind: 'absent' }
  | { kind: 'legacy'; total: number }
  | { kind: 'sequence'; attempts: number[] };
