/**
 * Find the founders of every company in a list and score them against ground truth.
 *
 * Run (from repo root): npm run founders -- --companies companies.txt --out .
 */
import './load-env.js';

import { loadFounderConfig } from './lib/founders-config.js';
import { runFindFounders } from './lib/find-founders-run.js';

async function main() {
  const config = loadFounderConfig();
  const { exitCode } = await runFindFounders(config);
  process.exitCode = exitCode;
}

main().catch((err) => {
  console.error('find-founders failed:', err);
  process.exit(1);
});
