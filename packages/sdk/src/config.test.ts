import { describe, it, expect } from 'vitest';
import { ConfigError } from '@ciris-stream/utils';
import { DEFAULT_STREAM_CONFIG, resolveStreamConfig, streamConfigFromEnv } from './config.js';

describe('resolveStreamConfig', () => {
  it('fills in defaults', () => {
    const config = resolveStreamConfig({ baseUrl: 'http://localhost:8080' });
    expect(config).toEqual({ ...DEFAULT_STREAM_CONFIG, baseUrl: 'http://localhost:8080' });
    expect(config.reconnectDelayMs).toBe(1_000);
    expect(config.reconnectMaxDelayMs).toBe(60_000);
    expect(config.bufferSize).toBe(1_000);
    expect(config.heartbeatIntervalMs).toBe(30_000);
  });

  it('ignores options explicitly set to undefined', () => {
    const config = resolveStreamConfig({ baseUrl: 'http://localhost:8080', bufferSize: undefined });
    expect(config.bufferSize).toBe(1_000);
  });

  it('lists every invalid option', () => {
    let error: unknown;
    try {
      resolveStreamConfig({ baseUrl: 'http://localhost:8080', bufferSize: 0, reconnectJitter: 2 });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^reconnectJitter: /);
      expect(error.issues[1]).toMatch(/^bufferSize: /);
    }
  });

  it('rejects a maximum delay below the base delay', () => {
    expect(() =>
      resolveStreamConfig({ baseUrl: 'http://localhost:8080', reconnectDelayMs: 5_000, reconnectMaxDelayMs: 1_000 })
    ).toThrow('Invalid stream configuration: reconnectMaxDelayMs: reconnectMaxDelayMs must be >= reconnectDelayMs');
  });

  it('rejects a base URL that is not a URL', () => {
    expect(() => resolveStreamConfig({ baseUrl: 'localhost' })).toThrow(ConfigError);
  });

  it('rejects a base URL the stream cannot be reached over', () => {
    expect(() => resolveStreamConfig({ baseUrl: 'ftp://agent.example.com' })).toThrow(
      'Invalid stream configuration: baseUrl: Expected an http(s):// or ws(s):// URL'
    );
  });

  it('validates initial subscriptions', () => {
    expect(() =>
      resolveStreamConfig({ baseUrl: 'http://localhost:8080', subscriptions: { logs: { limit: Number.NaN } } })
    ).toThrow(ConfigError);
    expect(() => resolveStreamConfig({ baseUrl: 'http://localhost:8080', subscriptions: { '': null } })).toThrow(
      ConfigError
    );
    expect(
      resolveStreamConfig({ baseUrl: 'http://localhost:8080', subscriptions: { logs: { level: 'ERROR' }, telemetry: null } })
        .subscriptions
    ).toEqual({ logs: { level: 'ERROR' }, telemetry: null });
  });
});

describe('streamConfigFromEnv', () => {
  it('reads the stream variables', () => {
    const config = streamConfigFromEnv({
      CIRIS_API_URL: 'https://agent.example.com',
      CIRIS_API_KEY: 'test-secret',
      CIRIS_STREAM_RECONNECT: 'false',
      CIRIS_STREAM_BUFFER_SIZE: '250',
      CIRIS_STREAM_HEARTBEAT_MS: '5000',
    });

    expect(config).toEqual({
      baseUrl: 'https://agent.example.com',
      token: 'test-secret',
      reconnect: false,
      bufferSize: 250,
      heartbeatIntervalMs: 5_000,
    });
  });

  it('leaves unset or unparseable variables out', () => {
    expect(streamConfigFromEnv({ CIRIS_STREAM_BUFFER_SIZE: 'lots', CIRIS_STREAM_RECONNECT: '' })).toEqual({});
  });
});
