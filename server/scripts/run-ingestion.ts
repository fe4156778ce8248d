import 'dotenv/config';
import { CONFIG } from '../config';
import { errorMessage } from '../errors';
import { pool } from '../db';
import { createIngestionRunner } from '../pipeline';
import { storage } from '../storage';

/**
 * One ingestion run from the command line.
 *
 *   npm run ingest -- [daysBack]
 *
 * Exits 1 when the run fails.
 */
function parseDaysBack(arg: string | undefined): number {
  if (arg === undefined) return CONFIG.ingestion.defaultDaysBack;
  const days = Number(arg);
  if (!Number.isInteger(days) || days < 1) {
    throw new Error(`daysBack must be a positive integer, got "${arg}"`);
  }
  return days;
}

async function main(): Promise<number> {
  const daysBack = parseDaysBack(process.argv[2]);
  const runner = await createIngestionRunner(storage);
  const summary = await runner.runIngestion(daysBack);

  if (summary.status === 'failed') {
    console.error(`\n❌ Run ${summary.runId} failed: ${summary.error}`);
    return 1;
  }

  console.log('\n📊 Run summary:');
  console.log(`   Run:            ${summary.runId}`);
  console.log(`   Dates fetched:  ${summary.datesFetched} (${summary.datesSkipped} skipped)`);
  console.log(`   Extraction:     ${summary.extraction}`);
  console.log(`   Listings found: ${summary.found}`);
  console.log(`   New:            ${summary.new}`);
  console.log(`   Updated:        ${summary.updated}`);
  console.log(`   Failed:         ${summary.failed}`);
  return 0;
}

main()
  .then(async (code) => {
    await pool.end();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    console.error('❌ Ingestion crashed:', errorMessage(error));
    await pool.end();
    process.exit(1);
  });
