/**
 * Transcription Session
 * Per-connection recording lifecycle: feeds audio through the frame buffer,
 * streams each segment to the recognition client while it is still open and
 * turns the client's events into outbound envelopes.
 *
 * States: ready -> recording -> draining -> ready, and closed from anywhere
 */

import { EventEmitter } from 'node:events';
import { AudioFrameBuffer } from '../vad/AudioFrameBuffer';
import { NEGOTIATED_FORMAT, createFrame } from '../audio/AudioFormat';
import type { AudioSegment, SegmentAudio } from '../audio/AudioFormat';
import type { RecognitionEvent, RecognitionSessionClient } from '../recognition/RecognitionSessionClient';
import type { PartialPolicy, VADSettings } from '../config';
import { BusyError, FormatError, SegmentTimeoutError, clientMessage, toError } from '../errors';
import {
  SUPPORTED_SAMPLE_RATE,
  configuredMessage,
  errorMessage,
  partialMessage,
  recordingStartedMessage,
  recordingStoppedMessage,
  transcriptionMessage,
} from '../protocol/messages';
import type { ConfigureMessage, OutboundMessage, StartRecordingMessage } from '../protocol/messages';
import { audioBytesReceived, errorsTotal, framesDropped, resultsEmitted, segmentsSealed } from '../utils/metrics';
import { componentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

export type SessionState = 'ready' | 'recording' | 'draining' | 'closed';

export interface TranscriptionSessionOptions {
  connectionId: string;
  vad: VADSettings;
  drainTimeoutMs: number;
  partialPolicy: PartialPolicy;
  /** A fresh client per recording; closed after its summary */
  createClient: () => RecognitionSessionClient;
  send: (message: OutboundMessage) => void;
  logger?: Logger;
}

interface SegmentTrack {
  id: number;
  lastPartial: string | null;
  done: boolean;
}

export class TranscriptionSession extends EventEmitter {
  private options: TranscriptionSessionOptions;
  private log: Logger;
  private state: SessionState = 'ready';
  private buffer: AudioFrameBuffer;
  private client: RecognitionSessionClient | null = null;
  private pump: Promise<void> | null = null;
  private tracks: Map<number, SegmentTrack> = new Map();
  private rejected: Set<number> = new Set();
  private finals: Map<number, string> = new Map();
  private drainWaiters: Array<() => void> = [];
  private segmentsThisRecording: number = 0;
  private readonly createdAt: number = Date.now();
  private counters = {
    audioChunks: 0,
    framesDropped: 0,
    segments: 0,
    partials: 0,
    transcriptions: 0,
    failures: 0,
    recordings: 0,
  };

  constructor(options: TranscriptionSessionOptions) {
    super();

    this.options = options;
    this.log = options.logger ?? componentLogger('session', { connectionId: options.connectionId });
    this.buffer = new AudioFrameBuffer({
      format: NEGOTIATED_FORMAT,
      vadThreshold: options.vad.vadThreshold,
      minSpeechMs: options.vad.minSpeechMs,
      silenceDurationMs: options.vad.silenceDurationMs,
      preSpeechPaddingMs: options.vad.preSpeechPaddingMs,
      maxSegmentMs: options.vad.maxSegmentMs,
    });

    this.buffer.on('segment:opened', (audio: SegmentAudio) => {
      this.openSegment(audio);
    });

    this.buffer.on('segment:audio', (audio: SegmentAudio) => {
      if (this.client && this.tracks.has(audio.segmentId)) {
        this.client.send(audio);
      }
    });
  }

  /**
   * Begin a recording. A second start while recording is ignored.
   */
  async start(message: StartRecordingMessage): Promise<void> {
    if (this.state !== 'ready') {
      this.log.debug({ state: this.state }, 'start_recording ignored');
      return;
    }

    if (message.sampleRate !== undefined && message.sampleRate !== SUPPORTED_SAMPLE_RATE) {
      throw new FormatError(
        `Unsupported sample rate ${message.sampleRate}; only ${SUPPORTED_SAMPLE_RATE} Hz mono 16-bit PCM is accepted`,
        { sampleRate: message.sampleRate }
      );
    }

    this.buffer.reset();
    this.tracks.clear();
    this.rejected.clear();
    this.finals.clear();
    this.segmentsThisRecording = 0;

    const client = this.options.createClient();
    this.client = client;
    this.pump = this.pumpResults(client);
    await client.open(NEGOTIATED_FORMAT, { languageCode: message.languageCode });

    this.counters.recordings++;
    this.transitionTo('recording');
    this.send(recordingStartedMessage(message.config));
    this.log.info({ config: message.config }, 'Recording started');
  }

  /**
   * Feed one binary frame. Only accepted while recording.
   */
  ingestAudio(data: Buffer): void {
    if (this.state !== 'recording') {
      this.counters.framesDropped++;
      framesDropped.inc();
      this.log.warn({ state: this.state, bytes: data.length }, 'Audio frame dropped outside recording');
      return;
    }

    this.counters.audioChunks++;
    audioBytesReceived.inc(data.length);

    for (const segment of this.buffer.ingest(createFrame(data))) {
      this.submit(segment);
    }
  }

  /**
   * Update VAD thresholds and echo the values now in effect
   */
  configure(message: ConfigureMessage): void {
    this.buffer.configure({
      vadThreshold: message.vadThreshold,
      silenceDurationMs: message.silenceDurationMs,
    });

    const { vadThreshold, silenceDurationMs } = this.buffer.getStats().vadConfig;
    this.log.info({ vadThreshold, silenceDurationMs }, 'VAD thresholds updated');
    this.send(configuredMessage(vadThreshold, silenceDurationMs / 1000));
  }

  /**
   * End the recording: seal buffered speech, wait for outstanding segments
   * and send the summary. A stop while ready is ignored.
   */
  async stop(): Promise<void> {
    if (this.state !== 'recording') {
      this.log.debug({ state: this.state }, 'stop_recording ignored');
      return;
    }

    this.transitionTo('draining');

    const tail = this.buffer.flush();
    if (tail) {
      this.submit(tail);
    }

    const drained = await this.waitForDrain(this.options.drainTimeoutMs);
    if (this.isClosed()) {
      return;
    }

    if (!drained) {
      for (const track of this.outstanding()) {
        const timeout = new SegmentTimeoutError(track.id, this.options.drainTimeoutMs, 'final');
        errorsTotal.inc({ code: timeout.code });
        this.failSegment(track, timeout);
      }
    }

    const finalTranscript = [...this.finals.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, text]) => text)
      .filter((text) => text.length > 0)
      .join(' ');

    this.send(
      recordingStoppedMessage(finalTranscript, this.buffer.getTotalDurationSeconds(), this.segmentsThisRecording)
    );
    this.log.info(
      { totalSegments: this.segmentsThisRecording, durationS: this.buffer.getTotalDurationSeconds() },
      'Recording stopped'
    );

    await this.releaseClient();

    this.tracks.clear();
    this.finals.clear();
    if (!this.isClosed()) {
      this.transitionTo('ready');
    }
  }

  /**
   * Tear down: cancels the recognition stream and drops buffered audio
   */
  async close(): Promise<void> {
    if (this.state === 'closed') {
      return;
    }

    this.transitionTo('closed');
    this.resolveDrainWaiters();
    this.buffer.reset();
    this.tracks.clear();
    this.rejected.clear();
    this.finals.clear();

    await this.releaseClient();
  }

  getState(): SessionState {
    return this.state;
  }

  getSnapshot() {
    return {
      state: this.state,
      uptimeMs: Date.now() - this.createdAt,
      createdAt: new Date(this.createdAt).toISOString(),
      outstandingSegments: this.outstanding().length,
      ...this.counters,
      buffer: this.buffer.getStats(),
      recognizer: this.client?.getStats() ?? null,
    };
  }

  /**
   * Private: speech started, so the segment's audio goes out from now on
   */
  private openSegment(audio: SegmentAudio): void {
    if (this.client && this.accept(this.client, audio.segmentId, audio)) {
      this.log.debug({ segmentId: audio.segmentId }, 'Segment opened');
    }
  }

  private submit(segment: AudioSegment): void {
    this.counters.segments++;
    this.segmentsThisRecording++;
    segmentsSealed.inc({ reason: segment.sealReason });

    const client = this.client;
    if (!client || this.rejected.has(segment.id)) {
      return;
    }

    if (this.tracks.has(segment.id)) {
      client.send(segment);
    } else if (!this.accept(client, segment.id, segment)) {
      return;
    }

    this.log.debug(
      { segmentId: segment.id, durationMs: Math.round(segment.durationMs), reason: segment.sealReason },
      'Segment sealed'
    );
  }

  /**
   * Private: hand the first audio of a segment to the client and start
   * tracking it; a busy client rejects the whole segment
   */
  private accept(client: RecognitionSessionClient, segmentId: number, input: SegmentAudio | AudioSegment): boolean {
    try {
      client.send(input);
    } catch (error) {
      if (error instanceof BusyError) {
        this.rejected.add(segmentId);
        this.counters.failures++;
        errorsTotal.inc({ code: error.code });
        this.log.warn({ segmentId }, 'Segment rejected, recognizer busy');
        this.send(errorMessage(error.message));
        return false;
      }
      throw error;
    }

    this.tracks.set(segmentId, { id: segmentId, lastPartial: null, done: false });
    return true;
  }

  private async pumpResults(client: RecognitionSessionClient): Promise<void> {
    try {
      for await (const event of client.results()) {
        this.handleEvent(event);
      }
    } catch (error) {
      this.log.error({ err: toError(error) }, 'Recognition result pump failed');
    }
  }

  private handleEvent(event: RecognitionEvent): void {
    const segmentId = event.kind === 'failed' ? event.segmentId : event.result.segmentId;
    const track = this.tracks.get(segmentId);

    if (!track || track.done) {
      // Results for a finished segment never reach the client
      this.log.debug({ segmentId, kind: event.kind }, 'Dropping late recognition event');
      return;
    }

    switch (event.kind) {
      case 'partial': {
        const text = event.result.text;
        if (
          this.options.partialPolicy === 'monotonic' &&
          track.lastPartial !== null &&
          text.length < track.lastPartial.length
        ) {
          return;
        }
        track.lastPartial = text;
        this.counters.partials++;
        resultsEmitted.inc({ kind: 'partial' });
        this.send(partialMessage(segmentId, text));
        break;
      }
      case 'final':
        track.done = true;
        this.finals.set(segmentId, event.result.text);
        this.counters.transcriptions++;
        resultsEmitted.inc({ kind: 'final' });
        this.send(
          transcriptionMessage(segmentId, event.result.text, event.result.words, event.result.processingTimeMs)
        );
        break;
      case 'failed':
        this.failSegment(track, event.error);
        break;
    }

    this.checkDrained();
  }

  private failSegment(track: SegmentTrack, error: Error): void {
    track.done = true;
    this.counters.failures++;
    this.log.warn({ segmentId: track.id, err: error }, 'Segment failed');
    this.send(errorMessage(clientMessage(error)));
  }

  private outstanding(): SegmentTrack[] {
    return [...this.tracks.values()].filter((track) => !track.done);
  }

  private waitForDrain(timeoutMs: number): Promise<boolean> {
    if (this.outstanding().length === 0) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.drainWaiters = this.drainWaiters.filter((waiter) => waiter !== onDrained);
        resolve(false);
      }, timeoutMs);

      const onDrained = () => {
        clearTimeout(timer);
        resolve(true);
      };

      this.drainWaiters.push(onDrained);
    });
  }

  private checkDrained(): void {
    if (this.drainWaiters.length > 0 && this.outstanding().length === 0) {
      this.resolveDrainWaiters();
    }
  }

  private resolveDrainWaiters(): void {
    for (const waiter of this.drainWaiters.splice(0)) {
      waiter();
    }
  }

  private async releaseClient(): Promise<void> {
    const client = this.client;
    const pump = this.pump;
    this.client = null;
    this.pump = null;

    if (client) {
      await client.close();
    }
    await pump;
  }

  private send(message: OutboundMessage): void {
    if (this.state === 'closed') {
      return;
    }
    this.options.send(message);
  }

  private isClosed(): boolean {
    return this.state === 'closed';
  }

  private transitionTo(next: SessionState): void {
    const previous = this.state;
    this.state = next;
    this.emit('state:changed', { from: previous, to: next });
  }
}
