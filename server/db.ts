import pkg from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import * as schema from "@shared/schema";
import { CONFIG } from './config';

const { Pool } = pkg;

if (!CONFIG.databaseUrl) {
  throw new Error(
    "DATABASE_URL must be set. Did you forget to provision a database?",
  );
}

export const pool = new Pool({ connectionString: CONFIG.databaseUrl });
export const db = drizzle(pool, { schema });
