/** Input headers the pipeline reads. Anything else passes through to the detail report. */
export const INPUT_COLUMNS = {
  matchNumber: 'Match Number',
  teamNumber: 'Team Number',
  autoNear: 'Auto Scored At Near',
  autoFar: 'Auto Scored At Far',
  teleNear: 'Tele-Op Scored At Near',
  teleFar: 'Tele-Op Scored At Far',
  endGame: 'End Game',
  autoCycles: 'Auto Cycles',
  teleCycles: 'Tele-Op Cycles',
  totalCycles: 'Total Cycles',
} as const;

export const SUMMARY_COLUMNS = [
  'Team Number',
  'matches',
  'auto_near_avg',
  'auto_far_avg',
  'tele_near_avg',
  'tele_far_avg',
  'auto_cycles_avg',
  'tele_cycles_avg',
  'total_cycles_avg',
  'auto_hit_rate',
  'tele_hit_rate',
  'end_score_avg',
  'total_score_avg',
  'auto_near_sum',
  'auto_far_sum',
  'tele_near_sum',
  'tele_far_sum',
  'auto_cycles_sum',
  'tele_cycles_sum',
  'total_cycles_sum',
  'end_score_sum',
  'total_score_sum',
] as const;

export const DETAIL_DERIVED_COLUMNS = [
  'auto_near_attempts',
  'auto_far_attempts',
  'tele_near_attempts',
  'tele_far_attempts',
  'auto_near_score',
  'auto_far_score',
  'tele_near_score',
  'tele_far_score',
  'Auto Off Target',
  'Tele-Op Off Target',
  'Auto Cycles',
  'Tele-Op Cycles',
  'Total Cycles',
  'auto_hit_rate',
  'tele_hit_rate',
  'End Game (Norm)',
  'end_game_score',
  'piece_score',
  'total_score',
] as const;

export const SUMMARY_FILE = 'team_score_summary.csv';
export const DETAIL_FILE = 'all_records_with_scores.csv';
