import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      CATALOG_URL: 'https://openrouter.ai/api/v1/models',
      SNAPSHOT_FILE: './models_snapshot.json',
      HTTP_TIMEOUT_MS: 30000,
      WEBHOOK_TIMEOUT_MS: 10000,
      NOTIFY_SECTION_LIMIT: 10,
      TEST_DISCORD: false,
    });
    expect(config.DISCORD_WEBHOOK).toBeUndefined();
  });

  it('should treat empty variables as unset', () => {
    const config = loadConfig({ DISCORD_WEBHOOK: '', CATALOG_API_KEY: '' });

    expect(config.DISCORD_WEBHOOK).toBeUndefined();
    expect(config.CATALOG_API_KEY).toBeUndefined();
  });

  it('should coerce numeric settings', () => {
    expect(loadConfig({ HTTP_TIMEOUT_MS: '5000' }).HTTP_TIMEOUT_MS).toBe(5000);
  });

  it('should read TEST_DISCORD as a flag', () => {
    expect(loadConfig({ TEST_DISCORD: '1' }).TEST_DISCORD).toBe(true);
    expect(loadConfig({ TEST_DISCORD: 'false' }).TEST_DISCORD).toBe(false);
    expect(loadConfig({ TEST_DISCORD: '0' }).TEST_DISCORD).toBe(false);
  });

  it('should reject a webhook that is not a URL', () => {
    expect(() => loadConfig({ DISCORD_WEBHOOK: 'not a url' })).toThrow();
  });
});
