import dotenv from 'dotenv';
import { ConfigError } from '../core/errors.js';
import type { ChangeFeedKind } from '../types/index.js';

export interface StoreConfig {
  uri: string;
  database: string;
  maxPoolSize: number;
  retryAttempts: number;
  retryBaseDelayMs: number;
}

export interface NotifierConfig {
  feed: ChangeFeedKind;
  pollIntervalMs: number;
  gapTimeoutMs: number;
  reorderWindowMs: number;
  subscriberBufferSize: number;
}

export interface SessionConfig {
  handshakeTimeoutMs: number;
  idleTimeoutMs: number;
  heartbeatIntervalMs: number;
  flushTimeoutMs: number;
}

export interface ShutdownConfig {
  timeout: number;
  forceExit: boolean;
}

export interface AppConfig {
  nodeEnv: string;
  httpPort: number;
  socketPort: number;
  urlPrefix: string;
  socketPath: string;
  publicDir: string;
  store: StoreConfig;
  notifier: NotifierConfig;
  session: SessionConfig;
  shutdown: ShutdownConfig;
}

type Env = Record<string, string | undefined>;

const FEED_KINDS: readonly ChangeFeedKind[] = ['local', 'poll', 'watch'];

function readInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

function readFeed(env: Env): ChangeFeedKind {
  const raw = readString(env, 'CHANGE_FEED', 'poll');
  const kind = FEED_KINDS.find((k) => k === raw);
  if (!kind) {
    throw new ConfigError(`CHANGE_FEED must be one of ${FEED_KINDS.join(', ')}, got "${raw}"`);
  }
  return kind;
}

/**
 * Build the service configuration from environment variables.
 * Defaults match the container deployment (ports 3000 and 5000, store at mongo:27017).
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    nodeEnv: readString(env, 'NODE_ENV', 'development'),
    httpPort: readInt(env, 'HTTP_PORT', 3000),
    socketPort: readInt(env, 'SOCKET_PORT', 5000),
    urlPrefix: readString(env, 'URL_PREFIX', '/api/v1'),
    socketPath: readString(env, 'SOCKET_PATH', '/ws'),
    publicDir: readString(env, 'PUBLIC_DIR', 'services/docrelay/public'),
    store: {
      uri: readString(env, 'MONGO_URI', 'mongodb://mongo:27017'),
      database: readString(env, 'MONGO_DB', 'docrelay'),
      maxPoolSize: readInt(env, 'MONGO_POOL_SIZE', 20, 1),
      retryAttempts: readInt(env, 'STORE_RETRY_ATTEMPTS', 3, 1),
      retryBaseDelayMs: readInt(env, 'STORE_RETRY_BASE_MS', 50),
    },
    notifier: {
      feed: readFeed(env),
      pollIntervalMs: readInt(env, 'POLL_INTERVAL_MS', 200, 1),
      gapTimeoutMs: readInt(env, 'GAP_TIMEOUT_MS', 1000),
      reorderWindowMs: readInt(env, 'REORDER_WINDOW_MS', 500),
      subscriberBufferSize: readInt(env, 'SUBSCRIBER_BUFFER', 256, 1),
    },
    session: {
      handshakeTimeoutMs: readInt(env, 'HANDSHAKE_TIMEOUT_MS', 5000, 1),
      idleTimeoutMs: readInt(env, 'IDLE_TIMEOUT_MS', 30000, 1),
      heartbeatIntervalMs: readInt(env, 'HEARTBEAT_INTERVAL_MS', 10000, 1),
      flushTimeoutMs: readInt(env, 'FLUSH_TIMEOUT_MS', 3000),
    },
    shutdown: {
      timeout: readInt(env, 'SHUTDOWN_TIMEOUT_MS', 30000, 1),
      forceExit: env['FORCE_EXIT_ON_SHUTDOWN'] !== 'false',
    },
  };
}

/**
 * Load .env into process.env, then read the configuration.
 */
export function loadEnvConfig(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}

export type ServiceMode = 'http' | 'socket' | 'both';

/**
 * `--http` runs the write path, `--socket` the delivery path; no flag runs them
 * together in one process for local development.
 */
export function parseServiceMode(argv: readonly string[]): ServiceMode {
  const http = argv.includes('--http');
  const socket = argv.includes('--socket');
  if (http && socket) {
    throw new ConfigError('Please specify only one server at a time: --http or --socket');
  }
  if (http) return 'http';
  if (socket) return 'socket';
  return 'both';
}
