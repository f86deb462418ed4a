import { readFile, readdir } from 'node:fs/promises';
import { env } from '../config/env.js';
import { createPool } from '../services/db.js';

const sqlDir = new URL('../../sql/', import.meta.url);

const pool = createPool(env.DATABASE_URL, 30000);
try {
  await pool.query(`CREATE TABLE IF NOT EXISTS schema_migrations (
    name TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )`);
  const applied = await pool.query<{ name: string }>('SELECT name FROM schema_migrations');
  const done = new Set(applied.rows.map((row) => row.name));

  const files = (await readdir(sqlDir)).filter((name) => name.endsWith('.sql')).sort();
  for (const name of files) {
    if (done.has(name)) {
      continue;
    }
    const sql = await readFile(new URL(name, sqlDir), 'utf8');
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [name]);
      await client.query('COMMIT');
      console.log(`[migrate] applied ${name}`);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
} finally {
  await pool.end();
}
