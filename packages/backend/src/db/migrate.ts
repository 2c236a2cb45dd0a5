import 'dotenv/config';
import { readFile } from 'fs/promises';
import pg from 'pg';

const schemaUrl = new URL('../../db/schema.sql', import.meta.url);

async function migrate() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL is required to run migrations');
  }

  const sql = await readFile(schemaUrl, 'utf8');
  const client = new pg.Client({ connectionString });
  await client.connect();

  try {
    await client.query(sql);
    console.log('Schema applied');
  } finally {
    await client.end();
  }
}

migrate().catch((err) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
