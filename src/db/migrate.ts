import { readFileSync } from 'fs';
import { join } from 'path';
import { pool } from './pool';

const MIGRATIONS = [
  { file: '001_create_processing_jobs.sql', label: 'processing_jobs table created' },
  { file: '002_create_job_events_and_decisions.sql', label: 'job events and decisions tables created' },
];

async function runMigrations() {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');

    for (const migration of MIGRATIONS) {
      const sql = readFileSync(join(__dirname, 'migrations', migration.file), 'utf-8');
      await client.query(sql);
      console.log(`✓ Migration ${migration.file.slice(0, 3)}: ${migration.label}`);
    }

    await client.query('COMMIT');
    console.log('✓ All migrations completed successfully');
  } catch (error) {
    await client.query('ROLLBACK');
    console.error('✗ Migration failed:', error);
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

runMigrations().catch((error) => {
  console.error('Migration error:', error);
  process.exit(1);
});
