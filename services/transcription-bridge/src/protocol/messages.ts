/**
 * Wire contract between the bridge and its clients
 * Inbound control messages are JSON text frames; audio arrives as binary
 * frames. Outbound envelopes keep a fixed field set per type.
 */

import { ProtocolError } from '../errors';
import type { RecognizedWord } from '../providers/RecognitionBackend';

export const SUPPORTED_SAMPLE_RATE = 16000;

// Inbound

export interface StartRecordingMessage {
  type: 'start_recording';
  config: Record<string, unknown>;
  sampleRate?: number;
  languageCode?: string;
}

export interface ConfigureMessage {
  type: 'configure';
  vadThreshold?: number;
  silenceDurationMs?: number;
}

export type ControlMessage =
  | StartRecordingMessage
  | { type: 'stop_recording' }
  | ConfigureMessage
  | { type: 'ping' }
  | { type: 'get_metrics' };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(source: Record<string, unknown>, field: string, type: string): number | undefined {
  const value = source[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ProtocolError(`Invalid ${field} in ${type}: expected a non-negative number`, { field });
  }
  return value;
}

function parseStartRecording(message: Record<string, unknown>): StartRecordingMessage {
  const config = message.config ?? {};
  if (!isRecord(config)) {
    throw new ProtocolError('Invalid config in start_recording: expected an object');
  }

  const sampleRate = optionalNumber(config, 'sample_rate', 'start_recording');
  const languageCode = config.language_code;

  return {
    type: 'start_recording',
    config,
    sampleRate,
    languageCode: typeof languageCode === 'string' && languageCode.length > 0 ? languageCode : undefined,
  };
}

function parseConfigure(message: Record<string, unknown>): ConfigureMessage {
  // Fields may sit at the top level or under `config`
  const source = isRecord(message.config) ? message.config : message;

  const vadThreshold = optionalNumber(source, 'vad_threshold', 'configure');
  if (vadThreshold !== undefined && vadThreshold > 1) {
    throw new ProtocolError('Invalid vad_threshold in configure: expected RMS energy between 0 and 1');
  }

  const silenceDuration = optionalNumber(source, 'silence_duration', 'configure');

  return {
    type: 'configure',
    vadThreshold,
    silenceDurationMs: silenceDuration === undefined ? undefined : Math.round(silenceDuration * 1000),
  };
}

/**
 * Parse a text frame into a control message. Throws ProtocolError for
 * malformed JSON, a missing type or an unknown type.
 */
export function parseControlMessage(text: string): ControlMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ProtocolError('Invalid JSON message');
  }

  if (!isRecord(parsed) || typeof parsed.type !== 'string') {
    throw new ProtocolError('Control message must be a JSON object with a string type');
  }

  switch (parsed.type) {
    case 'start_recording':
      return parseStartRecording(parsed);
    case 'stop_recording':
      return { type: 'stop_recording' };
    case 'configure':
      return parseConfigure(parsed);
    case 'ping':
      return { type: 'ping' };
    case 'get_metrics':
      return { type: 'get_metrics' };
    default:
      throw new ProtocolError(`Unknown message type: ${parsed.type}`, { type: parsed.type });
  }
}

// Outbound

export interface WireWord {
  word: string;
  start: number;
  end: number;
  confidence: number;
}

export type OutboundMessage =
  | { type: 'connection'; client_id: string; protocol_version: string }
  | { type: 'recording_started'; config: Record<string, unknown> }
  | { type: 'configured'; config: { vad_threshold: number; silence_duration: number } }
  | { type: 'recording_stopped'; final_transcript: string; total_duration: number; total_segments: number }
  | { type: 'partial'; segment_id: number; text: string; is_final: false }
  | {
      type: 'transcription';
      segment_id: number;
      text: string;
      is_final: true;
      words: WireWord[];
      processing_time_ms: number;
    }
  | { type: 'error'; error: string }
  | { type: 'pong' }
  | { type: 'metrics'; connection: Record<string, unknown>; session: Record<string, unknown> };

export type OutboundType = OutboundMessage['type'];

export function connectionMessage(clientId: string, protocolVersion: string): OutboundMessage {
  return { type: 'connection', client_id: clientId, protocol_version: protocolVersion };
}

export function recordingStartedMessage(config: Record<string, unknown>): OutboundMessage {
  return { type: 'recording_started', config };
}

export function configuredMessage(vadThreshold: number, silenceDurationSeconds: number): OutboundMessage {
  return { type: 'configured', config: { vad_threshold: vadThreshold, silence_duration: silenceDurationSeconds } };
}

export function recordingStoppedMessage(
  finalTranscript: string,
  totalDurationSeconds: number,
  totalSegments: number
): OutboundMessage {
  return {
    type: 'recording_stopped',
    final_transcript: finalTranscript,
    total_duration: Math.round(totalDurationSeconds * 1000) / 1000,
    total_segments: totalSegments,
  };
}

export function partialMessage(segmentId: number, text: string): OutboundMessage {
  return { type: 'partial', segment_id: segmentId, text, is_final: false };
}

export function transcriptionMessage(
  segmentId: number,
  text: string,
  words: RecognizedWord[],
  processingTimeMs: number
): OutboundMessage {
  return {
    type: 'transcription',
    segment_id: segmentId,
    text,
    is_final: true,
    words: words.map((word) => ({
      word: word.word,
      start: word.start,
      end: word.end,
      confidence: word.confidence,
    })),
    processing_time_ms: Math.round(processingTimeMs),
  };
}

export function errorMessage(error: string): OutboundMessage {
  return { type: 'error', error };
}

export function encode(message: OutboundMessage): string {
  return JSON.stringify(message);
}
