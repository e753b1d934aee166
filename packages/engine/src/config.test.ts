import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('should read settings from the environment', () => {
    const config = loadConfig({
      LEECH_ACTIONS_DB_PATH: '/tmp/leech.db',
      LEECH_ACTIONS_CONFIG_KEY: 'custom_key',
      NODE_ENV: 'production',
    });

    expect(config).toEqual({
      dbPath: '/tmp/leech.db',
      configKey: 'custom_key',
      nodeEnv: 'production',
    });
  });

  it('should fall back to defaults', () => {
    const config = loadConfig({});

    expect(config.configKey).toBe('leech_actions');
    expect(config.nodeEnv).toBe('development');
    expect(config.dbPath.endsWith('leech-actions.db')).toBe(true);
  });

  it('should treat empty values as unset', () => {
    const config = loadConfig({ LEECH_ACTIONS_CONFIG_KEY: '', NODE_ENV: '' });
    expect(config.configKey).toBe('leech_actions');
    expect(config.nodeEnv).toBe('development');
  });
});
