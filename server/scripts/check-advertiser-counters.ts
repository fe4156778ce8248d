import 'dotenv/config';
import { pool } from '../db';
import { errorMessage } from '../errors';
import { storage } from '../storage';

async function checkAdvertiserCounters(): Promise<number> {
  console.log('🔍 Checking advertiser listing counters...\n');

  const drift = await storage.getAdvertiserCounterDrift();

  if (drift.length === 0) {
    console.log('✅ Every advertiser counter matches its listings.');
    return 0;
  }

  console.log(`⚠️  Found ${drift.length} advertisers with a drifting counter:\n`);
  drift.forEach((row) => {
    console.log(`   ${row.phone}: counter ${row.total_listings}, listings ${row.actual_listings}`);
  });
  return 1;
}

checkAdvertiserCounters()
  .then(async (code) => {
    await pool.end();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    console.error('❌ Check failed:', errorMessage(error));
    await pool.end();
    process.exit(1);
  });
