/**
 * gRPC Recognition Backend
 * Streams audio to the remote recognizer over a bidirectional gRPC call
 * defined in proto/recognition.proto
 */

import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { existsSync } from 'fs';
import path from 'path';
import type { Writable } from 'stream';
import type { BackendResult, RecognitionBackend, RecognizedWord, StreamConfig } from './RecognitionBackend';
import { componentLogger } from '../utils/logger';

const SERVICE_PATH = ['speechbridge', 'asr', 'StreamingRecognizer'];
const METHOD_NAME = 'StreamingRecognize';

export interface GrpcBackendOptions {
  target: string;
  useTls?: boolean;
  protoPath?: string;
  connectTimeoutMs?: number;
}

type RecognizeRequest =
  | {
      streaming_config: {
        encoding: string;
        sample_rate_hertz: number;
        audio_channel_count: number;
        language_code: string;
        enable_automatic_punctuation: boolean;
        enable_word_time_offsets: boolean;
        interim_results: boolean;
      };
    }
  | { audio_content: Buffer }
  | { end_of_utterance: true };

const log = componentLogger('grpc-backend');

function resolveProtoPath(explicit?: string): string {
  const candidates = [
    explicit,
    path.resolve(__dirname, '../../proto/recognition.proto'),
    path.resolve(process.cwd(), 'services/transcription-bridge/proto/recognition.proto'),
    path.resolve(process.cwd(), 'proto/recognition.proto'),
  ].filter((candidate): candidate is string => typeof candidate === 'string');

  const found = candidates.find((candidate) => existsSync(candidate));
  if (!found) {
    throw new Error(`recognition.proto not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

/**
 * Load the recognizer service definition from its .proto file
 */
export function loadRecognizerService(protoPath?: string): grpc.ServiceClientConstructor {
  const packageDefinition = protoLoader.loadSync(resolveProtoPath(protoPath), {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
  });

  let node: grpc.GrpcObject | grpc.ServiceClientConstructor | grpc.ProtobufTypeDefinition =
    grpc.loadPackageDefinition(packageDefinition);

  for (const segment of SERVICE_PATH) {
    if (typeof node !== 'object' || 'format' in node) {
      break;
    }
    node = node[segment];
  }

  if (typeof node !== 'function') {
    throw new Error(`Service ${SERVICE_PATH.join('.')} missing from proto definition`);
  }

  return node;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function parseWords(value: unknown): RecognizedWord[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.filter(isRecord).map((word) => ({
    word: typeof word.word === 'string' ? word.word : '',
    start: numberOr(word.start_time, 0) / 1000,
    end: numberOr(word.end_time, 0) / 1000,
    confidence: numberOr(word.confidence, 0),
  }));
}

/**
 * Normalize a StreamingRecognizeResponse into backend results
 */
export function parseRecognizeResponse(message: unknown, timestamp: number = Date.now()): BackendResult[] {
  if (!isRecord(message) || !Array.isArray(message.results)) {
    return [];
  }

  const results: BackendResult[] = [];

  for (const result of message.results) {
    if (!isRecord(result) || !Array.isArray(result.alternatives) || result.alternatives.length === 0) {
      continue;
    }

    const alternative: unknown = result.alternatives[0];
    if (!isRecord(alternative)) {
      continue;
    }

    results.push({
      transcript: typeof alternative.transcript === 'string' ? alternative.transcript : '',
      isFinal: result.is_final === true,
      confidence: typeof alternative.confidence === 'number' ? alternative.confidence : undefined,
      words: parseWords(alternative.words),
      timestamp,
    });
  }

  return results;
}

export class GrpcRecognitionBackend implements RecognitionBackend {
  readonly kind = 'real' as const;
  readonly incremental = true;

  private client: grpc.Client;
  private method: grpc.MethodDefinition<RecognizeRequest, unknown>;
  private call: grpc.ClientDuplexStream<RecognizeRequest, unknown> | null = null;
  private isStreaming: boolean = false;
  private cancelled: boolean = false;
  private connectTimeoutMs: number;
  private target: string;

  constructor(service: grpc.ServiceClientConstructor, options: GrpcBackendOptions) {
    const credentials = options.useTls ? grpc.credentials.createSsl() : grpc.credentials.createInsecure();
    const method = service.service[METHOD_NAME];
    if (!method) {
      throw new Error(`Method ${METHOD_NAME} missing from ${service.serviceName}`);
    }

    this.client = new service(options.target, credentials);
    this.method = method;
    this.target = options.target;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 3000;
  }

  async startStream(
    onResult: (result: BackendResult) => void,
    onError: (error: Error) => void,
    config: StreamConfig
  ): Promise<void> {
    if (this.isStreaming) {
      throw new Error('Stream already active');
    }

    await this.waitForReady();

    this.cancelled = false;
    const call = this.client.makeBidiStreamRequest<RecognizeRequest, unknown>(
      this.method.path,
      this.method.requestSerialize,
      this.method.responseDeserialize
    );
    this.call = call;
    this.isStreaming = true;

    call.on('data', (message: unknown) => {
      for (const result of parseRecognizeResponse(message)) {
        onResult(result);
      }
    });

    call.on('error', (error: grpc.ServiceError) => {
      this.isStreaming = false;
      this.call = null;
      if (this.cancelled && error.code === grpc.status.CANCELLED) {
        return;
      }
      log.warn({ target: this.target, code: error.code, details: error.details }, 'Recognizer stream error');
      onError(new Error(`Recognizer stream failed: ${error.details || error.message}`));
    });

    call.on('end', () => {
      const unexpected = this.isStreaming && !this.cancelled;
      this.isStreaming = false;
      this.call = null;
      if (unexpected) {
        onError(new Error('Recognizer closed the stream'));
      }
    });

    call.write({
      streaming_config: {
        encoding: 'LINEAR_PCM',
        sample_rate_hertz: config.format.sampleRate,
        audio_channel_count: config.format.channels,
        language_code: config.languageCode ?? 'en-US',
        enable_automatic_punctuation: config.enablePunctuation ?? true,
        enable_word_time_offsets: config.enableWordOffsets ?? true,
        interim_results: config.interimResults ?? true,
      },
    });
  }

  async sendAudio(audioChunk: Buffer): Promise<void> {
    const call = this.activeCall();
    await this.write(call, { audio_content: audioChunk });
  }

  async endUtterance(): Promise<void> {
    const call = this.activeCall();
    await this.write(call, { end_of_utterance: true });
  }

  async endStream(): Promise<void> {
    if (!this.isStreaming || !this.call) {
      return;
    }

    // Half-close; the server finishes and ends its side
    this.isStreaming = false;
    this.call.end();
    this.call = null;
  }

  cancel(): void {
    this.cancelled = true;
    this.isStreaming = false;
    if (this.call) {
      this.call.cancel();
      this.call = null;
    }
  }

  /**
   * Close the underlying channel; used when the pool drops this backend
   */
  close(): void {
    this.cancel();
    this.client.close();
  }

  getName(): string {
    return `gRPC ${this.target}`;
  }

  private activeCall(): grpc.ClientDuplexStream<RecognizeRequest, unknown> {
    if (!this.isStreaming || !this.call) {
      throw new Error('Stream not active');
    }
    return this.call;
  }

  private write(call: grpc.ClientDuplexStream<RecognizeRequest, unknown>, request: RecognizeRequest): Promise<void> {
    return writeWithBackpressure(call, request);
  }

  private waitForReady(): Promise<void> {
    return new Promise((resolve, reject) => {
      const deadline = Date.now() + this.connectTimeoutMs;
      this.client.waitForReady(deadline, (error?: Error) => {
        if (error) {
          reject(new Error(`Recognizer ${this.target} not reachable: ${error.message}`));
          return;
        }
        resolve();
      });
    });
  }
}

/**
 * Factory for the backend pool; loads the service definition once
 */
export function createGrpcBackendFactory(options: GrpcBackendOptions): () => GrpcRecognitionBackend {
  const service = loadRecognizerService(options.protoPath);
  return () => new GrpcRecognitionBackend(service, options);
}

/**
 * Write one message, waiting for 'drain' when the stream's buffer is full.
 * Rejects if the stream errors or closes before it drains.
 */
export function writeWithBackpressure(stream: Writable, message: unknown): Promise<void> {
  return new Promise((resolve, reject) => {
    if (stream.write(message)) {
      resolve();
      return;
    }

    const cleanup = () => {
      stream.off('drain', onDrain);
      stream.off('error', onError);
      stream.off('close', onClose);
    };
    const onDrain = () => {
      cleanup();
      resolve();
    };
    const onError = (error: Error) => {
      cleanup();
      reject(error);
    };
    const onClose = () => {
      cleanup();
      reject(new Error('Recognizer stream closed before it drained'));
    };

    stream.on('drain', onDrain);
    stream.on('error', onError);
    stream.on('close', onClose);
  });
}
