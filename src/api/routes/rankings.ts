import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { MissingColumnError } from '../../io/csv-reader.js';
import { buildRanking, type RankingTable } from '../../ranking/view.js';
import { computeETag, readReport } from '../reports.js';
import type { ReportRouteOptions } from './health.js';

const uploadSchema = z.string();

type RankingResult = { ok: true; ranking: RankingTable } | { ok: false; error: string };

function rankSummary(csv: string): RankingResult {
  try {
    return { ok: true, ranking: buildRanking(csv) };
  } catch (err) {
    if (err instanceof MissingColumnError) return { ok: false, error: err.message };
    throw err;
  }
}

export const rankingsRoutes: FastifyPluginAsync<ReportRouteOptions> = async (app, opts) => {
  app.addContentTypeParser('text/csv', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  // GET /rankings — summary ranked by average total score
  app.get('/', async (request, reply) => {
    const csv = readReport(opts.reportsDir, 'summary');
    if (csv === null) {
      return reply.status(404).send({ error: 'Team summary not found. Run the report pipeline first.' });
    }

    const etag = computeETag(csv);
    if (request.headers['if-none-match'] === etag) {
      return reply.status(304).send();
    }

    const result = rankSummary(csv);
    if (!result.ok) return reply.status(422).send({ error: result.error });
    void reply.header('ETag', etag);
    return result.ranking;
  });

  // POST /rankings — rank an uploaded summary instead of the stored one
  app.post('/', async (request, reply) => {
    const body = uploadSchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'Send the team summary as text/csv' });
    }
    request.log.info({ bytes: body.data.length }, 'Ranking uploaded summary');
    const result = rankSummary(body.data);
    if (!result.ok) return reply.status(422).send({ error: result.error });
    return result.ranking;
  });
};
