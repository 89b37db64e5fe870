import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, afterAll } from 'vitest';
import { listInputFiles, readRawRows } from '../../src/io/csv-reader.js';
import { serializeDetail, serializeSummary, writeReports } from '../../src/io/csv-writer.js';
import { summarizeTeams } from '../../src/pipeline/aggregator.js';
import { normalizeRecords } from '../../src/pipeline/normalizer.js';
import { DEFAULT_SCORING_RULES } from '../../src/scoring/rules.js';
import { fixturePath, makeTempDir, removeTempDirs, rawRecord } from '../helpers/fixture-loader.js';

afterAll(removeTempDirs);

const rules = DEFAULT_SCORING_RULES;

function fixtureRecords() {
  return normalizeRecords(readRawRows(listInputFiles(fixturePath('scouting'))), rules);
}

describe('serializeSummary', () => {
  it('should write the summary columns in order, one line per team', () => {
    const csv = serializeSummary(summarizeTeams(fixtureRecords(), rules));

    expect(csv.split('\n')).toEqual([
      'Team Number,matches,auto_near_avg,auto_far_avg,tele_near_avg,tele_far_avg,auto_cycles_avg,tele_cycles_avg,total_cycles_avg,auto_hit_rate,tele_hit_rate,end_score_avg,total_score_avg,auto_near_sum,auto_far_sum,tele_near_sum,tele_far_sum,auto_cycles_sum,tele_cycles_sum,total_cycles_sum,end_score_sum,total_score_sum',
      '100,2,4.5,1.5,1.5,0,2,0.5,2.5,1,1,7.5,30,9,3,3,0,4,1,5,15,60',
      '200,2,4.5,1,7.5,0,4,4,8,0.4583333333333333,0.625,15,54,9,2,15,0,8,8,16,30,108',
      '300,1,0,0,0,0,0,0,0,0,0,0,0,0,0,0,0,0,0,0,0,0',
      '',
    ]);
  });

  it('should write only the header for no teams', () => {
    expect(serializeSummary([]).split('\n')).toHaveLength(2);
  });
});

describe('serializeDetail', () => {
  it('should write one line per record in input order', () => {
    const lines = serializeDetail(fixtureRecords()).trimEnd().split('\n');

    expect(lines).toEqual([
      'Match Number,Team Number,Auto Scored At Near,Auto Scored At Far,Tele-Op Scored At Near,Tele-Op Scored At Far,End Game,Scouter,auto_near_attempts,auto_far_attempts,tele_near_attempts,tele_far_attempts,auto_near_score,auto_far_score,tele_near_score,tele_far_score,Auto Off Target,Tele-Op Off Target,Auto Cycles,Tele-Op Cycles,Total Cycles,auto_hit_rate,tele_hit_rate,End Game (Norm),end_game_score,piece_score,total_score',
      '1,100,"3,3",0,3,0,Fully,Ana,"3,3",,3,,6,0,3,0,0,0,2,1,3,1,1,Fully,10,27,37',
      '2,100,3,3,0,0,Partially,Ben,3,3,,,3,3,0,0,0,0,2,0,2,1,0,Partially,5,18,23',
      '1,200,"3,1,0",2,"3,3,3",,Double Park Dealer; Fully,Ana,"3,1,0",2,"3,3,3",,4,2,9,0,6,0,4,3,7,0.5,1,Double Park Dealer,20,45,65',
      '3,200,"2,3",,"3,0,3",,Double Park Beneficiary,,"2,3",,"3,0,3",,5,0,6,0,1,3,4,5,9,0.4166666666666667,0.4,Double Park Beneficiary,10,33,43',
      '0,300,,,,,,,,,,,0,0,0,0,0,0,0,0,0,0,0,,0,0,0',
    ]);
  });

  it('should replace input columns that are recomputed', () => {
    const records = normalizeRecords(
      [rawRecord({ autoNear: '3', extra: { 'Auto Off Target': '9', total_score: '99', Notes: 'ok' } })],
      rules,
    );
    const [header, row] = serializeDetail(records).trimEnd().split('\n');
    const columns = header?.split(',') ?? [];

    expect(columns.filter((c) => c === 'Auto Off Target')).toHaveLength(1);
    expect(columns.filter((c) => c === 'total_score')).toHaveLength(1);
    expect(columns[7]).toBe('Notes');
    expect(row?.split(',')[7]).toBe('ok');
    expect(row).toBe('1,100,3,,,,,ok,3,,,,3,0,0,0,0,0,1,0,1,1,0,,0,9,9');
  });
});

describe('writeReports', () => {
  it('should create the output directory and both files', () => {
    const dir = path.join(makeTempDir(), 'nested', 'reports');
    const paths = writeReports(dir, 'summary\n', 'detail\n');

    expect(paths.summaryPath).toBe(path.join(dir, 'team_score_summary.csv'));
    expect(paths.detailPath).toBe(path.join(dir, 'all_records_with_scores.csv'));
    expect(fs.readFileSync(paths.summaryPath, 'utf-8')).toBe('summary\n');
    expect(fs.readFileSync(paths.detailPath, 'utf-8')).toBe('detail\n');
  });

  it('should replace existing reports', () => {
    const dir = makeTempDir();
    writeReports(dir, 'old summary\n', 'old detail\n');
    const paths = writeReports(dir, 'summary\n', 'detail\n');

    expect(fs.readFileSync(paths.summaryPath, 'utf-8')).toBe('summary\n');
    expect(fs.readdirSync(dir).sort()).toEqual(['all_records_with_scores.csv', 'team_score_summary.csv']);
  });

  it('should leave no summary or temp files when the detail report cannot be placed', () => {
    const dir = makeTempDir();
    fs.mkdirSync(path.join(dir, 'all_records_with_scores.csv'));

    expect(() => writeReports(dir, 'summary\n', 'detail\n')).toThrow();
    expect(fs.readdirSync(dir)).toEqual(['all_records_with_scores.csv']);
  });
});
