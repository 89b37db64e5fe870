/** Per-team aggregate. Averages are sums divided by `matches`. */
export interface TeamSummary {
  teamNumber: number;
  matches: number;
  autoNearSum: number;
  autoFarSum: number;
  teleNearSum: number;
  teleFarSum: number;
  autoCyclesSum: number;
  teleCyclesSum: number;
  totalCyclesSum: number;
  endScoreSum: number;
  totalScoreSum: number;
  autoNearAvg: number;
  autoFarAvg: number;
  teleNearAvg: number;
  teleFarAvg: number;
  autoCyclesAvg: number;
  teleCyclesAvg: number;
  totalCyclesAvg: number;
  autoHitRate: number;
  teleHitRate: number;
  endScoreAvg: number;
  totalScoreAvg: number;
}
