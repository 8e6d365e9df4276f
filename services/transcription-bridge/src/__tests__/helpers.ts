/**
 * Shared fixtures: PCM generators, a scripted recognizer and a fake client
 * transport. Everything runs in process.
 */

import { createFrame } from '../audio/AudioFormat';
import type { AudioFrame, AudioSegment } from '../audio/AudioFormat';
import type { ClientTransport } from '../connection/ConnectionGateway';
import type { BackendResult, RecognitionBackend, StreamConfig } from '../providers/RecognitionBackend';

const SAMPLE_RATE = 16000;

export function sinePcm(durationMs: number, frequency: number = 440, amplitude: number = 0.5): Buffer {
  const samples = Math.round((durationMs / 1000) * SAMPLE_RATE);
  const buffer = Buffer.alloc(samples * 2);
  for (let i = 0; i < samples; i++) {
    const value = Math.round(Math.sin((2 * Math.PI * frequency * i) / SAMPLE_RATE) * amplitude * 32767);
    buffer.writeInt16LE(value, i * 2);
  }
  return buffer;
}

export function silencePcm(durationMs: number): Buffer {
  return Buffer.alloc(Math.round((durationMs / 1000) * SAMPLE_RATE) * 2);
}

/**
 * Split PCM into frames of `frameMs` (20 ms by default, 640 bytes)
 */
export function toFrames(pcm: Buffer, frameMs: number = 20): Buffer[] {
  const frameBytes = Math.round((frameMs / 1000) * SAMPLE_RATE) * 2;
  const frames: Buffer[] = [];
  for (let offset = 0; offset < pcm.length; offset += frameBytes) {
    frames.push(pcm.subarray(offset, offset + frameBytes));
  }
  return frames;
}

export function audioFrames(pcm: Buffer, frameMs: number = 20): AudioFrame[] {
  return toFrames(pcm, frameMs).map((data) => createFrame(data));
}

export function makeSegment(id: number, durationMs: number = 200): AudioSegment {
  const frames = audioFrames(sinePcm(durationMs));
  const byteLength = frames.reduce((sum, frame) => sum + frame.data.length, 0);
  return {
    id,
    frames,
    durationMs,
    byteLength,
    startedAt: Date.now(),
    sealedAt: Date.now(),
    sealReason: 'silence',
  };
}

export interface UtterancePlan {
  partials?: string[];
  final?: string;
  latencyMs?: number;
  hang?: boolean; // never answer
  fail?: string; // stream error instead of a result
  latePartial?: string; // partial sent after the final
  partialOnAudio?: string; // partial sent for every chunk while audio flows
}

/**
 * Shared state for every ScriptedBackend a pool creates
 */
export class RecognizerScript {
  connectFailures: number = 0;
  connects: number = 0;
  utterances: number = 0;
  audioWrites: number = 0;
  bytesReceived: number[] = [];
  plan: (index: number) => UtterancePlan;

  constructor(plan: (index: number) => UtterancePlan = (index) => ({ final: `utterance ${index}` })) {
    this.plan = plan;
  }

  factory(): () => ScriptedBackend {
    return () => new ScriptedBackend(this);
  }
}

export class ScriptedBackend implements RecognitionBackend {
  readonly kind = 'real' as const;
  readonly incremental = true;

  private script: RecognizerScript;
  private onResult: ((result: BackendResult) => void) | null = null;
  private onError: ((error: Error) => void) | null = null;
  private streaming: boolean = false;
  private bytes: number = 0;
  private timers: Set<NodeJS.Timeout> = new Set();

  constructor(script: RecognizerScript) {
    this.script = script;
  }

  async startStream(
    onResult: (result: BackendResult) => void,
    onError: (error: Error) => void,
    _config: StreamConfig
  ): Promise<void> {
    this.script.connects++;
    if (this.script.connects <= this.script.connectFailures) {
      throw new Error('connection refused');
    }
    this.onResult = onResult;
    this.onError = onError;
    this.streaming = true;
  }

  async sendAudio(audioChunk: Buffer): Promise<void> {
    if (!this.streaming) {
      throw new Error('Stream not active');
    }
    this.bytes += audioChunk.length;
    this.script.audioWrites++;

    const partial = this.script.plan(this.script.utterances + 1).partialOnAudio;
    if (partial !== undefined) {
      this.schedule(0, () => this.onResult?.({ transcript: partial, isFinal: false, timestamp: Date.now() }));
    }
  }

  async endUtterance(): Promise<void> {
    const index = ++this.script.utterances;
    this.script.bytesReceived.push(this.bytes);
    this.bytes = 0;

    const plan = this.script.plan(index);
    const latency = plan.latencyMs ?? 10;

    if (plan.hang) {
      return;
    }

    if (plan.fail) {
      const message = plan.fail;
      this.schedule(latency, () => this.onError?.(new Error(message)));
      return;
    }

    const partials = plan.partials ?? [];
    partials.forEach((text, i) => {
      this.schedule(((i + 1) * latency) / (partials.length + 1), () =>
        this.onResult?.({ transcript: text, isFinal: false, timestamp: Date.now() })
      );
    });

    const final = plan.final ?? '';
    this.schedule(latency, () =>
      this.onResult?.({
        transcript: final,
        isFinal: true,
        confidence: 0.95,
        words: final
          .split(' ')
          .filter((word) => word.length > 0)
          .map((word, i) => ({ word, start: i * 0.5, end: i * 0.5 + 0.4, confidence: 0.95 })),
        timestamp: Date.now(),
      })
    );

    const latePartial = plan.latePartial;
    if (latePartial !== undefined) {
      this.schedule(latency + 5, () => this.onResult?.({ transcript: latePartial, isFinal: false, timestamp: Date.now() }));
    }
  }

  async endStream(): Promise<void> {
    this.cancel();
  }

  cancel(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.streaming = false;
  }

  getName(): string {
    return 'Scripted';
  }

  private schedule(delayMs: number, fn: () => void): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, delayMs);
    this.timers.add(timer);
  }
}

export interface SentMessage {
  type: string;
  [field: string]: unknown;
}

export class FakeTransport implements ClientTransport {
  sent: string[] = [];
  closed: { code: number; reason: string } | null = null;
  terminated: boolean = false;
  pings: number = 0;

  send(data: string): void {
    this.sent.push(data);
  }

  close(code: number, reason: string): void {
    if (!this.closed) {
      this.closed = { code, reason };
    }
  }

  terminate(): void {
    this.terminated = true;
  }

  ping(): void {
    this.pings++;
  }

  isOpen(): boolean {
    return this.closed === null && !this.terminated;
  }

  messages(): SentMessage[] {
    return this.sent.map((raw) => {
      const parsed: SentMessage = JSON.parse(raw);
      return parsed;
    });
  }

  ofType(type: string): SentMessage[] {
    return this.messages().filter((message) => message.type === type);
  }
}
