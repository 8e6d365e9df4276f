/**
 * Bridge configuration
 * Read once from the environment at startup; everything downstream receives
 * the frozen object and never reads process.env itself.
 */

import { logger } from './utils/logger';

export type DegradedMode = 'reject' | 'synthetic';
export type PartialPolicy = 'latest' | 'monotonic';
export type BackendMode = 'grpc' | 'synthetic';

export interface AudioConfig {
  sampleRate: number;
  channels: number;
  bitDepth: number;
}

export interface VADSettings {
  vadThreshold: number; // RMS energy, 0-1
  minSpeechMs: number;
  silenceDurationMs: number;
  preSpeechPaddingMs: number;
  maxSegmentMs: number;
}

export interface BackendSettings {
  mode: BackendMode;
  target: string;
  useTls: boolean;
  protoPath?: string;
  languageCode: string;
  enablePunctuation: boolean;
  enableWordOffsets: boolean;
  connectTimeoutMs: number;
  segmentTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  chunkSizeBytes: number;
  maxQueuedSegments: number;
  degradedMode: DegradedMode;
  maxPoolSize: number;
  poolAcquireTimeoutMs: number;
  poolIdleTimeoutMs: number;
}

export interface GatewaySettings {
  path: string;
  maxConnections: number;
  maxSessionMs: number;
  idleTimeoutMs: number;
  heartbeatIntervalMs: number;
  maxMessageBytes: number;
  closeGraceMs: number;
  protocolVersion: string;
}

export interface SessionSettings {
  drainTimeoutMs: number;
  partialPolicy: PartialPolicy;
}

export interface BridgeConfig {
  host: string;
  port: number;
  audio: AudioConfig;
  vad: VADSettings;
  backend: BackendSettings;
  gateway: GatewaySettings;
  session: SessionSettings;
}

type Env = Record<string, string | undefined>;

function intFrom(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    logger.warn({ name, raw, fallback }, 'Invalid integer in environment, using default');
    return fallback;
  }
  return value;
}

function floatFrom(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseFloat(raw);
  if (!Number.isFinite(value) || value < 0) {
    logger.warn({ name, raw, fallback }, 'Invalid number in environment, using default');
    return fallback;
  }
  return value;
}

function boolFrom(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  return raw.toLowerCase() === 'true';
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === raw.toLowerCase());
  if (!match) {
    logger.warn({ name, raw, allowed, fallback }, 'Unsupported value in environment, using default');
    return fallback;
  }
  return match;
}

/**
 * Build the bridge configuration from environment variables
 */
export function loadConfig(env: Env = process.env): BridgeConfig {
  const sampleRate = intFrom(env, 'AUDIO_SAMPLE_RATE', 16000);
  if (sampleRate !== 16000) {
    logger.warn({ sampleRate }, 'Only 16 kHz audio is supported, ignoring AUDIO_SAMPLE_RATE');
  }

  const config: BridgeConfig = {
    host: env.APP_HOST || '0.0.0.0',
    port: intFrom(env, 'APP_PORT', 8443),
    audio: {
      sampleRate: 16000,
      channels: 1,
      bitDepth: 16,
    },
    vad: {
      vadThreshold: floatFrom(env, 'VAD_THRESHOLD', 0.02),
      minSpeechMs: intFrom(env, 'VAD_MIN_SPEECH_MS', 100),
      silenceDurationMs: intFrom(env, 'VAD_SILENCE_DURATION_MS', 800),
      preSpeechPaddingMs: intFrom(env, 'VAD_PRE_SPEECH_PADDING_MS', 300),
      maxSegmentMs: intFrom(env, 'AUDIO_MAX_SEGMENT_DURATION_S', 30) * 1000,
    },
    backend: {
      mode: oneOf(env, 'RECOGNIZER_MODE', ['grpc', 'synthetic'] as const, 'grpc'),
      target: `${env.RIVA_HOST || 'localhost'}:${intFrom(env, 'RIVA_PORT', 50051)}`,
      useTls: boolFrom(env, 'RIVA_SSL', false),
      protoPath: env.RECOGNIZER_PROTO_PATH || undefined,
      languageCode: env.RIVA_LANGUAGE_CODE || 'en-US',
      enablePunctuation: boolFrom(env, 'RIVA_ENABLE_AUTOMATIC_PUNCTUATION', true),
      enableWordOffsets: boolFrom(env, 'RIVA_ENABLE_WORD_TIME_OFFSETS', true),
      connectTimeoutMs: intFrom(env, 'RIVA_CONNECT_TIMEOUT_MS', 3000),
      segmentTimeoutMs: intFrom(env, 'RIVA_TIMEOUT_MS', 5000),
      maxRetries: intFrom(env, 'RIVA_MAX_RETRIES', 3),
      retryBaseDelayMs: intFrom(env, 'RIVA_RETRY_DELAY_MS', 1000),
      retryMaxDelayMs: intFrom(env, 'RIVA_RETRY_MAX_DELAY_MS', 30000),
      chunkSizeBytes: intFrom(env, 'RIVA_CHUNK_SIZE_BYTES', 8192),
      maxQueuedSegments: intFrom(env, 'RIVA_MAX_QUEUED_SEGMENTS', 8),
      degradedMode: oneOf(env, 'DEGRADED_MODE', ['reject', 'synthetic'] as const, 'reject'),
      maxPoolSize: intFrom(env, 'RIVA_MAX_STREAMS', 100),
      poolAcquireTimeoutMs: intFrom(env, 'RIVA_POOL_ACQUIRE_TIMEOUT_MS', 5000),
      poolIdleTimeoutMs: intFrom(env, 'RIVA_POOL_IDLE_TIMEOUT_MS', 60000),
    },
    gateway: {
      path: env.WS_PATH || '/ws/transcribe',
      maxConnections: intFrom(env, 'WS_MAX_CONNECTIONS', 100),
      maxSessionMs: intFrom(env, 'WS_MAX_SESSION_S', 3600) * 1000,
      idleTimeoutMs: intFrom(env, 'WS_IDLE_TIMEOUT_S', 60) * 1000,
      heartbeatIntervalMs: intFrom(env, 'WS_PING_INTERVAL_S', 30) * 1000,
      maxMessageBytes: intFrom(env, 'WS_MAX_MESSAGE_SIZE_MB', 10) * 1024 * 1024,
      closeGraceMs: intFrom(env, 'WS_CLOSE_GRACE_MS', 5000),
      protocolVersion: '1.0',
    },
    session: {
      drainTimeoutMs: intFrom(env, 'SESSION_DRAIN_TIMEOUT_MS', 10000),
      partialPolicy: oneOf(env, 'PARTIAL_POLICY', ['latest', 'monotonic'] as const, 'latest'),
    },
  };

  return Object.freeze(config);
}
