import 'dotenv/config';
import pkg from 'pg';
const { Pool } = pkg;
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { errorMessage } from '../errors';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const MIGRATION_FILE = '0000_initial.sql';

async function runMigration() {
  if (!process.env.DATABASE_URL) {
    throw new Error('DATABASE_URL not found in environment');
  }

  const pool = new Pool({ connectionString: process.env.DATABASE_URL });
  console.log(`🔄 Running migration: ${MIGRATION_FILE}`);

  try {
    const migrationPath = join(__dirname, '../../migrations', MIGRATION_FILE);
    const sql = readFileSync(migrationPath, 'utf-8');

    console.log('📄 Executing SQL...');
    await pool.query(sql);

    console.log('✅ Migration completed successfully!');
    console.log('📊 Tables: listings, listing_snapshots, advertisers, run_logs');
  } catch (error) {
    console.error('❌ Migration failed:', errorMessage(error));
    throw error;
  } finally {
    await pool.end();
  }
}

runMigration().catch(() => {
  process.exit(1);
});
