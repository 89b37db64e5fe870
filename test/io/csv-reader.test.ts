import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, afterAll } from 'vitest';
import {
  listInputFiles,
  parseCsvTable,
  readRawRows,
  requireColumns,
  MissingColumnError,
  toRawRecord,
} from '../../src/io/csv-reader.js';
import { fixturePath, makeTempDir, removeTempDirs } from '../helpers/fixture-loader.js';

afterAll(removeTempDirs);

describe('listInputFiles', () => {
  it('should list CSV files in file-name order', () => {
    const files = listInputFiles(fixturePath('scouting'));
    expect(files.map((f) => path.basename(f))).toEqual(['event-a.csv', 'event-b.csv']);
  });

  it('should sort by code point, not locale', () => {
    const dir = makeTempDir();
    for (const name of ['b.csv', 'C.csv', 'a.CSV', '10.csv', '9.csv']) {
      fs.writeFileSync(path.join(dir, name), 'Team Number\n');
    }
    expect(listInputFiles(dir).map((f) => path.basename(f))).toEqual(['10.csv', '9.csv', 'C.csv', 'a.CSV', 'b.csv']);
  });

  it('should fail when the directory has no CSV files', () => {
    const dir = makeTempDir();
    fs.writeFileSync(path.join(dir, 'readme.txt'), 'nothing here');
    expect(() => listInputFiles(dir)).toThrow(`No CSV files found in ${dir}`);
  });

  it('should fail when the directory does not exist', () => {
    const dir = path.join(makeTempDir(), 'missing');
    expect(() => listInputFiles(dir)).toThrow(`No CSV files found in ${dir}`);
  });
});

describe('parseCsvTable', () => {
  it('should map cells to header names', () => {
    const table = parseCsvTable('Match Number,Team Number\n1,100\n2,200\n');
    expect(table.header).toEqual(['Match Number', 'Team Number']);
    expect(table.rows).toEqual([
      { 'Match Number': '1', 'Team Number': '100' },
      { 'Match Number': '2', 'Team Number': '200' },
    ]);
  });

  it('should strip a byte order mark and skip blank lines', () => {
    const table = parseCsvTable('\uFEFFTeam Number,End Game\n\n100,Fully\n\n');
    expect(table.header).toEqual(['Team Number', 'End Game']);
    expect(table.rows).toEqual([{ 'Team Number': '100', 'End Game': 'Fully' }]);
  });

  it('should tolerate short rows', () => {
    const table = parseCsvTable('a,b,c\n1,2\n');
    expect(table.rows).toEqual([{ a: '1', b: '2' }]);
  });

  it('should keep quoted sequences intact', () => {
    const table = parseCsvTable('Auto Scored At Near\n"3,0,3"\n');
    expect(table.rows[0]).toEqual({ 'Auto Scored At Near': '3,0,3' });
  });

  it('should return an empty table for empty input', () => {
    expect(parseCsvTable('')).toEqual({ header: [], rows: [] });
  });
});

describe('requireColumns', () => {
  it('should name the missing column', () => {
    const table = parseCsvTable('Team Number\n100\n');
    expect(() => requireColumns(table, ['Team Number', 'total_score_avg'])).toThrow(MissingColumnError);
    expect(() => requireColumns(table, ['total_score_avg'])).toThrow('total_score_avg not found in CSV.');
  });
});

describe('toRawRecord', () => {
  it('should split known columns from extras', () => {
    const raw = toRawRecord({
      'Match Number': '3',
      'Team Number': '200',
      'Auto Cycles': '4',
      Scouter: 'Ana',
      Notes: 'fast',
    });
    expect(raw.matchNumber).toBe('3');
    expect(raw.teamNumber).toBe('200');
    expect(raw.autoCycles).toBe('4');
    expect(raw.autoNear).toBeUndefined();
    expect(raw.extra).toEqual({ Scouter: 'Ana', Notes: 'fast' });
  });
});

describe('readRawRows', () => {
  it('should concatenate files in order', () => {
    const rows = readRawRows(listInputFiles(fixturePath('scouting')));
    expect(rows).toHaveLength(5);
    expect(rows.map((r) => r.teamNumber)).toEqual(['100', '100', '200', '200', '300']);
    expect(rows[2]?.endGame).toBe('Double Park Dealer; Fully');
    expect(rows[3]?.autoCycles).toBe('4');
  });
});
