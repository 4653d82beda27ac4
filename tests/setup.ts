import dotenv from 'dotenv';
import path from 'path';

process.env.NODE_ENV = 'test';

// .env.test wins over .env for local runs
dotenv.config({ path: path.resolve(process.cwd(), '.env.test') });
dotenv.config();

// The pg pool module refuses to load without a connection string; no test opens a connection.
if (!process.env.DB_CONNECTION_STRING) {
  process.env.DB_CONNECTION_STRING = 'postgresql://localhost:5432/f30_validator_test';
}

if (!process.env.REGISTRY_AGENT_URL) {
  process.env.REGISTRY_AGENT_URL = 'http://registry-agent.test';
}
