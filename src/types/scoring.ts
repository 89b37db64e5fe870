/** Fixed point-scoring constants for one game season. */
export interface ScoringRules {
  /** Points awarded per scored piece. */
  pointsPerPiece: number;
  /** Most points a single attempt can earn; off-target is measured against it. */
  maxAttemptValue: number;
  /** Endgame category label -> bonus points. Unlisted labels score 0. */
  endgamePoints: Record<string, number>;
}
