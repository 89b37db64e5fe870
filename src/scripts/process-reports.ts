/**
 * Run the scouting report pipeline once.
 * Usage: npx tsx src/scripts/process-reports.ts [--input dir] [--output dir] [--rules file]
 * Defaults: INPUT_DIR, REPORTS_DIR and SCORING_RULES_PATH from the environment.
 */
import { config } from '../config.js';
import { runPipeline } from '../pipeline/run.js';
import { loadScoringRules } from '../scoring/rules.js';
import { logger } from '../utils/logger.js';

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (!arg?.startsWith('--') || next === undefined || next.startsWith('--')) continue;
    out[arg.slice(2)] = next;
    i++;
  }
  return out;
}

const args = parseArgs(process.argv.slice(2));

try {
  const result = runPipeline({
    inputDir: args['input'] ?? config.INPUT_DIR,
    outputDir: args['output'] ?? config.REPORTS_DIR,
    rules: loadScoringRules(args['rules'] ?? config.SCORING_RULES_PATH),
  });
  console.log(`Saved summary: ${result.summaryPath}`);
  console.log(`Saved detailed records: ${result.detailPath}`);
} catch (err) {
  logger.fatal(err, 'Report pipeline failed');
  process.exit(1);
}
