/**
 * Recognition Backend Interface
 * Defines the contract for streaming recognizers (gRPC service, synthetic)
 */

import type { AudioFormat } from '../audio/AudioFormat';

export interface RecognizedWord {
  word: string;
  start: number; // seconds from segment start
  end: number;
  confidence: number;
}

export interface BackendResult {
  transcript: string;
  isFinal: boolean;
  confidence?: number;
  words?: RecognizedWord[];
  timestamp: number;
}

export interface StreamConfig {
  format: AudioFormat;
  languageCode?: string;
  enablePunctuation?: boolean;
  enableWordOffsets?: boolean;
  interimResults?: boolean;
}

export type BackendKind = 'real' | 'synthetic';

export interface RecognitionBackend {
  /** Real recognizer or the clearly marked synthetic stand-in */
  readonly kind: BackendKind;

  /** Accepts audio while an utterance is still being written */
  readonly incremental: boolean;

  /**
   * Open the bidirectional stream. Resolves once the backend accepted it,
   * rejects when it cannot be reached.
   * @param onResult Called for every partial and final hypothesis
   * @param onError Called when the open stream fails or closes unexpectedly
   */
  startStream(
    onResult: (result: BackendResult) => void,
    onError: (error: Error) => void,
    config: StreamConfig
  ): Promise<void>;

  /**
   * Send PCM audio for the current utterance
   */
  sendAudio(audioChunk: Buffer): Promise<void>;

  /**
   * Mark the end of the current utterance; the backend answers with a final
   */
  endUtterance(): Promise<void>;

  /**
   * Half-close the stream and release it
   */
  endStream(): Promise<void>;

  /**
   * Abort the stream immediately, dropping anything in flight
   */
  cancel(): void;

  getName(): string;
}
