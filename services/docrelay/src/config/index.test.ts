import { describe, it, expect } from 'vitest';
import { ConfigError } from '../core/errors.js';
import { loadConfig, parseServiceMode } from './index.js';

describe('loadConfig', () => {
  it('falls back to the container defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      nodeEnv: 'development',
      httpPort: 3000,
      socketPort: 5000,
      urlPrefix: '/api/v1',
      socketPath: '/ws',
      publicDir: 'services/docrelay/public',
      store: { uri: 'mongodb://mongo:27017', database: 'docrelay', retryAttempts: 3 },
      notifier: { feed: 'poll', pollIntervalMs: 200, subscriberBufferSize: 256 },
      session: { idleTimeoutMs: 30000, heartbeatIntervalMs: 10000 },
      shutdown: { timeout: 30000, forceExit: true },
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      HTTP_PORT: '8080',
      MONGO_URI: ' memory:// ',
      CHANGE_FEED: 'watch',
      SUBSCRIBER_BUFFER: '16',
      FORCE_EXIT_ON_SHUTDOWN: 'false',
    });

    expect(config.httpPort).toBe(8080);
    expect(config.store.uri).toBe('memory://');
    expect(config.notifier.feed).toBe('watch');
    expect(config.notifier.subscriberBufferSize).toBe(16);
    expect(config.shutdown.forceExit).toBe(false);
  });

  it('rejects values it cannot use', () => {
    expect(() => loadConfig({ HTTP_PORT: 'eighty' })).toThrow(
      new ConfigError('HTTP_PORT must be an integer >= 0, got "eighty"')
    );
    expect(() => loadConfig({ SUBSCRIBER_BUFFER: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ CHANGE_FEED: 'kafka' })).toThrow(
      new ConfigError('CHANGE_FEED must be one of local, poll, watch, got "kafka"')
    );
  });
});

describe('parseServiceMode', () => {
  it('picks the services to run from the command line', () => {
    expect(parseServiceMode(['node', 'main.js', '--http'])).toBe('http');
    expect(parseServiceMode(['node', 'main.js', '--socket'])).toBe('socket');
    expect(parseServiceMode(['node', 'main.js'])).toBe('both');
  });

  it('refuses both flags at once', () => {
    expect(() => parseServiceMode(['node', 'main.js', '--http', '--socket'])).toThrow(
      new ConfigError('Please specify only one server at a time: --http or --socket')
    );
  });
});
