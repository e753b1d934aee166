import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

// Load .env file
dotenv.config();

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface Config {
  /** SQLite file backing the configuration store (':memory:' for a throwaway one) */
  dbPath: string;
  /** Key the configuration document is stored under */
  configKey: string;
  nodeEnv: string;
}

/**
 * Build the process configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    dbPath: env.LEECH_ACTIONS_DB_PATH || join(__dirname, '..', 'data', 'leech-actions.db'),
    configKey: env.LEECH_ACTIONS_CONFIG_KEY || 'leech_actions',
    nodeEnv: env.NODE_ENV || 'development',
  };
}

export const config: Config = loadConfig();
