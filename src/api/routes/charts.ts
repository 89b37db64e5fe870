import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';
import { MissingColumnError, parseCsvTable, type CsvTable } from '../../io/csv-reader.js';
import {
  endgameFrequency,
  insights,
  scoreHistogram,
  teamAverageScores,
  teamCycleAverages,
  teamHitRates,
} from '../../charts/series.js';
import { readReport } from '../reports.js';
import type { ReportRouteOptions } from './health.js';

const CHARTS = {
  endgame: (table: CsvTable) => endgameFrequency(table),
  'team-scores': (table: CsvTable) => teamAverageScores(table),
  cycles: (table: CsvTable) => teamCycleAverages(table),
  'hit-rates': (table: CsvTable) => teamHitRates(table),
  insights: (table: CsvTable) => insights(table),
} as const;

const DETAIL_MISSING = 'Detail report not found. Run the report pipeline first.';

const binsSchema = z.coerce.number().int().min(1).max(100).default(20);

function isChartName(name: string): name is keyof typeof CHARTS {
  return Object.hasOwn(CHARTS, name);
}

export const chartsRoutes: FastifyPluginAsync<ReportRouteOptions> = async (app, opts) => {
  // GET /charts/scores?bins=20 — total score distribution
  app.get<{ Querystring: { bins?: string } }>('/scores', async (request, reply) => {
    const bins = binsSchema.safeParse(request.query.bins);
    if (!bins.success) {
      return reply.status(400).send({ error: 'bins must be an integer between 1 and 100' });
    }
    const binCount = bins.data;
    const table = loadDetail(opts.reportsDir);
    if (!table) return reply.status(404).send({ error: DETAIL_MISSING });
    return chartResponse(reply, () => scoreHistogram(table, binCount));
  });

  // GET /charts/:name — endgame | team-scores | cycles | hit-rates | insights
  app.get<{ Params: { name: string } }>('/:name', async (request, reply) => {
    const { name } = request.params;
    if (!isChartName(name)) {
      return reply.status(400).send({ error: `Unknown chart: ${name}` });
    }
    const table = loadDetail(opts.reportsDir);
    if (!table) return reply.status(404).send({ error: DETAIL_MISSING });
    return chartResponse(reply, () => CHARTS[name](table));
  });
};

function loadDetail(reportsDir: string): CsvTable | null {
  const csv = readReport(reportsDir, 'detail');
  return csv === null ? null : parseCsvTable(csv);
}

/** Wraps a series as `{ data }`; a detail report lacking the series' columns is a 422. */
function chartResponse<T>(reply: FastifyReply, build: () => T) {
  try {
    return { data: build() };
  } catch (err) {
    if (err instanceof MissingColumnError) {
      return reply.status(422).send({ error: err.message });
    }
    throw err;
  }
}
