/**
 * Synthetic Recognition Backend
 * Stand-in recognizer that answers every utterance with generated text.
 * Used as the degraded mode when the real recognizer is unreachable and as a
 * deterministic backend for local development.
 */

import type { BackendResult, RecognitionBackend, RecognizedWord, StreamConfig } from './RecognitionBackend';
import { durationMs } from '../audio/AudioFormat';

export const SYNTHETIC_MARKER = '[synthetic]';

export interface UtteranceInfo {
  index: number; // 1-based within this stream
  audioMs: number;
}

export interface SyntheticBackendOptions {
  text?: string | ((utterance: UtteranceInfo) => string);
  partials?: number; // partial hypotheses before each final
  latencyMs?: number | ((utterance: UtteranceInfo) => number);
  confidence?: number;
  marked?: boolean; // prefix text with SYNTHETIC_MARKER
}

export class SyntheticRecognitionBackend implements RecognitionBackend {
  readonly kind = 'synthetic' as const;
  readonly incremental = false;

  private options: Required<Omit<SyntheticBackendOptions, 'text' | 'latencyMs'>> &
    Pick<SyntheticBackendOptions, 'text' | 'latencyMs'>;
  private onResult: ((result: BackendResult) => void) | null = null;
  private config: StreamConfig | null = null;
  private utteranceBytes: number = 0;
  private utteranceCount: number = 0;
  private timers: Set<NodeJS.Timeout> = new Set();
  private isStreaming: boolean = false;

  constructor(options: SyntheticBackendOptions = {}) {
    this.options = {
      text: options.text,
      partials: options.partials ?? 1,
      latencyMs: options.latencyMs,
      confidence: options.confidence ?? 0.9,
      marked: options.marked ?? true,
    };
  }

  async startStream(
    onResult: (result: BackendResult) => void,
    _onError: (error: Error) => void,
    config: StreamConfig
  ): Promise<void> {
    if (this.isStreaming) {
      throw new Error('Stream already active');
    }

    this.onResult = onResult;
    this.config = config;
    this.utteranceBytes = 0;
    this.utteranceCount = 0;
    this.isStreaming = true;
  }

  async sendAudio(audioChunk: Buffer): Promise<void> {
    if (!this.isStreaming) {
      throw new Error('Stream not active');
    }
    this.utteranceBytes += audioChunk.length;
  }

  async endUtterance(): Promise<void> {
    if (!this.isStreaming || !this.config) {
      throw new Error('Stream not active');
    }

    const utterance: UtteranceInfo = {
      index: ++this.utteranceCount,
      audioMs: durationMs(this.utteranceBytes, this.config.format),
    };
    this.utteranceBytes = 0;

    const text = this.textFor(utterance);
    const latency = this.latencyFor(utterance);
    const words = text.split(/\s+/).filter((word) => word.length > 0);

    for (let i = 1; i <= this.options.partials; i++) {
      const prefix = words.slice(0, Math.max(1, Math.ceil((words.length * i) / (this.options.partials + 1))));
      this.schedule((latency * i) / (this.options.partials + 1), {
        transcript: prefix.join(' '),
        isFinal: false,
        timestamp: Date.now(),
      });
    }

    this.schedule(latency, {
      transcript: text,
      isFinal: true,
      confidence: this.options.confidence,
      words: this.wordTimings(words, utterance.audioMs),
      timestamp: Date.now(),
    });
  }

  async endStream(): Promise<void> {
    this.cancel();
  }

  cancel(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.isStreaming = false;
    this.onResult = null;
  }

  getName(): string {
    return 'Synthetic';
  }

  private schedule(delayMs: number, result: BackendResult): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.onResult?.({ ...result, timestamp: Date.now() });
    }, delayMs);
    this.timers.add(timer);
  }

  private textFor(utterance: UtteranceInfo): string {
    const { text } = this.options;
    const body =
      typeof text === 'function'
        ? text(utterance)
        : text ?? `transcript unavailable for ${(utterance.audioMs / 1000).toFixed(1)}s of audio`;

    return this.options.marked ? `${SYNTHETIC_MARKER} ${body}` : body;
  }

  private latencyFor(utterance: UtteranceInfo): number {
    const { latencyMs } = this.options;
    if (typeof latencyMs === 'function') {
      return latencyMs(utterance);
    }
    return latencyMs ?? 20;
  }

  private wordTimings(words: string[], audioMs: number): RecognizedWord[] {
    if (words.length === 0) {
      return [];
    }
    const step = audioMs / 1000 / words.length;

    return words.map((word, index) => ({
      word,
      start: Number((index * step).toFixed(3)),
      end: Number(((index + 1) * step).toFixed(3)),
      confidence: this.options.confidence,
    }));
  }
}
