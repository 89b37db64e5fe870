import fs from 'node:fs';
import type { FastifyPluginAsync } from 'fastify';
import { reportPath } from '../reports.js';

export interface ReportRouteOptions {
  reportsDir: string;
}

export const healthRoutes: FastifyPluginAsync<ReportRouteOptions> = async (app, opts) => {
  app.get('/health', async () => {
    const summary = fs.existsSync(reportPath(opts.reportsDir, 'summary'));
    const detail = fs.existsSync(reportPath(opts.reportsDir, 'detail'));
    return {
      status: summary && detail ? 'ready' : 'missing_reports',
      timestamp: new Date().toISOString(),
      reports: {
        summary: summary ? 'present' : 'missing',
        detail: detail ? 'present' : 'missing',
      },
    };
  });
};
