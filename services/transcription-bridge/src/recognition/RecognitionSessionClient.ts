/**
 * Recognition Session Client
 * Owns one long-lived recognizer stream for a connection. Segments are sent
 * strictly one at a time, each streamed while it is still open when the
 * backend takes incremental audio; results come back through a single lazy
 * sequence.
 *
 * State machine: idle -> connecting -> streaming -> (closing | failed) -> idle
 */

import { EventEmitter } from 'node:events';
import type { AudioFormat, AudioFrame, AudioSegment, SegmentAudio } from '../audio/AudioFormat';
import type { BackendPool, BackendLease } from '../connection/BackendPool';
import type { BackendResult, RecognitionBackend, RecognizedWord } from '../providers/RecognitionBackend';
import type { DegradedMode } from '../config';
import {
  BackendUnavailableError,
  BridgeError,
  BusyError,
  RecognitionStreamError,
  SegmentTimeoutError,
  toError,
} from '../errors';
import { AsyncQueue } from '../utils/AsyncQueue';
import { RetriesExhaustedError, backoffDelay, sleep, withRetry } from '../utils/retry';
import { backendConnectAttempts, errorsTotal, segmentLatency } from '../utils/metrics';
import { componentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

export type ClientState = 'idle' | 'connecting' | 'streaming' | 'closing' | 'failed';

export interface RecognitionResult {
  segmentId: number;
  text: string;
  words: RecognizedWord[];
  confidence: number;
  isFinal: boolean;
  processingTimeMs: number;
  synthetic: boolean;
}

export type RecognitionEvent =
  | { kind: 'partial'; result: RecognitionResult }
  | { kind: 'final'; result: RecognitionResult }
  | { kind: 'failed'; segmentId: number; error: BridgeError };

export interface RecognitionClientOptions {
  languageCode?: string;
  enablePunctuation?: boolean;
  enableWordOffsets?: boolean;
  interimResults?: boolean;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  segmentTimeoutMs?: number;
  chunkSizeBytes?: number;
  maxQueuedSegments?: number;
  degradedMode?: DegradedMode;
  /** Builds the synthetic stand-in used when degradedMode is 'synthetic' */
  fallbackFactory?: () => RecognitionBackend;
  backendName?: string;
}

/** Per-recording overrides of the client-wide stream settings */
export interface StreamOptions {
  languageCode?: string;
  interimResults?: boolean;
}

interface SegmentWork {
  id: number;
  audio: AsyncQueue<AudioFrame>; // closed when the segment is sealed or finished
  openedAt: number;
  sealedAt?: number;
  onSealed?: () => void;
}

interface InFlightSegment {
  work: SegmentWork;
  sawPartial: boolean;
  timer?: NodeJS.Timeout;
  settle: () => void;
}

interface ActiveStream {
  generation: number;
  backend: RecognitionBackend;
  lease?: BackendLease; // absent for the synthetic fallback
}

export class RecognitionSessionClient extends EventEmitter {
  private pool: BackendPool;
  private options: Required<Omit<RecognitionClientOptions, 'fallbackFactory'>> &
    Pick<RecognitionClientOptions, 'fallbackFactory'>;
  private log: Logger;
  private state: ClientState = 'idle';
  private format: AudioFormat | null = null;
  private streamOptions: StreamOptions = {};
  private segments = new AsyncQueue<SegmentWork>();
  private events = new AsyncQueue<RecognitionEvent>();
  private works: Map<number, SegmentWork> = new Map(); // open, queued or in flight
  private lastAccepted: number = 0;
  private stream: ActiveStream | null = null;
  private inFlight: InFlightSegment | null = null;
  private processing: number | null = null;
  private generation: number = 0;
  private degraded: boolean = false;
  private resultsTaken: boolean = false;
  private abort = new AbortController();
  private worker: Promise<void> | null = null;

  constructor(pool: BackendPool, options: RecognitionClientOptions = {}, logger?: Logger) {
    super();

    this.pool = pool;
    this.log = logger ?? componentLogger('recognition-client');
    this.options = {
      languageCode: options.languageCode ?? 'en-US',
      enablePunctuation: options.enablePunctuation ?? true,
      enableWordOffsets: options.enableWordOffsets ?? true,
      interimResults: options.interimResults ?? true,
      maxRetries: options.maxRetries ?? 3,
      retryBaseDelayMs: options.retryBaseDelayMs ?? 1000,
      retryMaxDelayMs: options.retryMaxDelayMs ?? 30000,
      segmentTimeoutMs: options.segmentTimeoutMs ?? 5000,
      chunkSizeBytes: options.chunkSizeBytes ?? 8192,
      maxQueuedSegments: options.maxQueuedSegments ?? 8,
      degradedMode: options.degradedMode ?? 'reject',
      fallbackFactory: options.fallbackFactory,
      backendName: options.backendName ?? 'recognizer',
    };
  }

  /**
   * Prepare the client for a recording; the backend stream itself is opened
   * when the first segment is ready
   */
  async open(format: AudioFormat, options: StreamOptions = {}): Promise<void> {
    if (this.worker) {
      return;
    }
    if (this.segments.isClosed) {
      throw new Error('Recognition client is closed');
    }

    this.format = format;
    this.streamOptions = options;
    this.worker = this.run();
  }

  /**
   * Queue audio for a segment. SegmentAudio adds frames to a segment that is
   * still open and must cover every frame in order; an AudioSegment seals it
   * (or queues it whole when nothing was streamed). The first input of a new
   * segment throws BusyError when too many segments are unfinished. Input for
   * a segment that was rejected or has already finished is dropped.
   */
  send(input: SegmentAudio | AudioSegment): void {
    if (!this.worker || this.segments.isClosed) {
      throw new Error('Recognition client is not open');
    }

    if ('segmentId' in input) {
      const work = this.workFor(input.segmentId);
      for (const frame of input.frames) {
        work?.audio.push(frame);
      }
      return;
    }

    const existing = this.works.get(input.id);
    const work = existing ?? this.workFor(input.id);
    if (!work || work.sealedAt !== undefined) {
      return;
    }
    if (!existing) {
      for (const frame of input.frames) {
        work.audio.push(frame);
      }
    }

    work.sealedAt = Date.now();
    work.audio.close();
    work.onSealed?.();
  }

  /**
   * Lazy sequence of recognition events; ends when the client closes.
   * May only be consumed once.
   */
  results(): AsyncIterable<RecognitionEvent> {
    if (this.resultsTaken) {
      throw new Error('results() can only be consumed once');
    }
    this.resultsTaken = true;
    return this.events;
  }

  /**
   * Cancel anything in flight and release the backend stream
   */
  async close(): Promise<void> {
    if (this.state === 'closing' || this.segments.isClosed) {
      await this.worker;
      return;
    }

    this.transitionTo('closing');
    this.segments.close();
    this.abort.abort(new Error('Recognition client closed'));

    const inFlight = this.inFlight;
    if (inFlight) {
      // Abandoned: the connection is going away, nobody is waiting for it
      this.clearInFlight(inFlight);
      inFlight.settle();
    }

    await this.teardownStream('closed', true);
    await this.worker;

    this.events.close();
    for (const work of this.works.values()) {
      work.audio.close();
    }
    this.works.clear();
    this.transitionTo('idle');
  }

  getState(): ClientState {
    return this.state;
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  pendingCount(): number {
    return this.works.size;
  }

  getStats() {
    return {
      state: this.state,
      degraded: this.degraded,
      pendingSegments: this.pendingCount(),
      inFlightSegment: this.processing,
      backend: this.stream?.backend.getName() ?? null,
    };
  }

  /**
   * Private: the unfinished segment with this id, created on first sight.
   * Ids arrive in increasing order, so an older unknown id has finished.
   */
  private workFor(segmentId: number): SegmentWork | null {
    const existing = this.works.get(segmentId);
    if (existing) {
      return existing;
    }
    if (segmentId <= this.lastAccepted) {
      this.log.debug({ segmentId }, 'Dropping audio for a finished segment');
      return null;
    }

    // A rejected segment stays rejected, even once the queue has room
    this.lastAccepted = segmentId;
    const pending = this.pendingCount();
    if (pending >= this.options.maxQueuedSegments) {
      throw new BusyError(segmentId, pending);
    }

    const work: SegmentWork = { id: segmentId, audio: new AsyncQueue<AudioFrame>(), openedAt: Date.now() };
    this.works.set(segmentId, work);
    this.segments.push(work);
    return work;
  }

  /**
   * Private: worker loop, one segment at a time in sequence order
   */
  private async run(): Promise<void> {
    for await (const work of this.segments) {
      if (this.abort.signal.aborted) {
        break;
      }
      this.processing = work.id;
      try {
        await this.processSegment(work);
      } catch (error) {
        if (this.abort.signal.aborted) {
          break;
        }
        this.log.error({ err: toError(error), segmentId: work.id }, 'Unexpected error processing segment');
        this.fail(work.id, new RecognitionStreamError(`Segment ${work.id} failed: ${toError(error).message}`));
      } finally {
        this.processing = null;
        work.audio.close();
        this.works.delete(work.id);
      }
    }
  }

  private async processSegment(work: SegmentWork): Promise<void> {
    const stream = await this.ensureStream(work.id);
    if (!stream) {
      return;
    }

    const outcome = new Promise<void>((resolve) => {
      this.inFlight = { work, sawPartial: false, settle: resolve };
    });

    const inFlight = this.inFlight;
    if (!inFlight) {
      return;
    }

    // The deadline runs from the seal, not while the speaker is still talking
    if (work.sealedAt !== undefined) {
      this.armTimeout(inFlight);
    } else {
      work.onSealed = () => this.armTimeout(inFlight);
    }

    // A write stalled on flow control must not outlive a timeout, so the
    // outcome is awaited rather than the write
    this.writeSegment(stream, work).catch((error: unknown) => {
      this.handleStreamError(stream.generation, toError(error));
    });

    await outcome;
  }

  private armTimeout(inFlight: InFlightSegment): void {
    if (this.inFlight !== inFlight || inFlight.timer) {
      return;
    }
    inFlight.timer = setTimeout(() => {
      this.handleTimeout(inFlight);
    }, this.options.segmentTimeoutMs);
  }

  private async writeSegment(stream: ActiveStream, work: SegmentWork): Promise<void> {
    const { backend, generation } = stream;
    // Stop writing once the segment is settled: the backend may already
    // serve another client
    const live = () => this.inFlight?.work === work && this.stream?.generation === generation;

    // Incremental backends get chunks as frames arrive; the others get the
    // whole segment once it is sealed
    let chunk: Buffer[] = [];
    let chunkBytes = 0;
    for await (const frame of work.audio) {
      if (!live()) {
        return;
      }
      chunk.push(frame.data);
      chunkBytes += frame.data.length;
      if (backend.incremental && chunkBytes >= this.options.chunkSizeBytes) {
        await backend.sendAudio(Buffer.concat(chunk, chunkBytes));
        chunk = [];
        chunkBytes = 0;
      }
    }

    if (!live()) {
      return;
    }
    if (chunkBytes > 0) {
      await backend.sendAudio(Buffer.concat(chunk, chunkBytes));
    }
    if (live()) {
      await backend.endUtterance();
    }
  }

  /**
   * Private: reuse the open stream or open a new one with retries. Returns
   * null when the segment was failed instead.
   */
  private async ensureStream(segmentId: number): Promise<ActiveStream | null> {
    if (this.stream && this.state === 'streaming') {
      return this.stream;
    }

    if (this.degraded) {
      return this.openFallback();
    }

    this.transitionTo('connecting');

    try {
      const stream = await withRetry(() => this.openBackendStream(), {
        maxRetries: this.options.maxRetries,
        baseDelayMs: this.options.retryBaseDelayMs,
        maxDelayMs: this.options.retryMaxDelayMs,
        signal: this.abort.signal,
        onRetry: (error, attempt, delayMs) => {
          this.log.warn({ err: error, attempt, delayMs }, 'Recognizer connect failed, retrying');
          this.emit('backend:retry', { attempt, delayMs, error });
        },
      });
      this.transitionTo('streaming');
      return stream;
    } catch (error) {
      if (this.abort.signal.aborted) {
        return null;
      }

      const attempts = error instanceof RetriesExhaustedError ? error.attempts : this.options.maxRetries + 1;
      const cause = error instanceof RetriesExhaustedError ? error.lastError : toError(error);
      const unavailable = new BackendUnavailableError(this.options.backendName, attempts, cause);

      this.log.error({ err: cause, attempts, degradedMode: this.options.degradedMode }, 'Recognizer unavailable');

      if (this.options.degradedMode === 'synthetic' && this.options.fallbackFactory) {
        this.degraded = true;
        this.emit('degraded', { error: unavailable });
        return this.openFallback();
      }

      this.fail(segmentId, unavailable);
      await this.backoffToIdle(1);
      return null;
    }
  }

  private async openBackendStream(): Promise<ActiveStream> {
    const lease = await this.pool.acquire();
    const generation = ++this.generation;

    try {
      await this.startBackend(lease.backend, generation);
      backendConnectAttempts.inc({ backend: lease.backend.kind, outcome: 'success' });
    } catch (error) {
      backendConnectAttempts.inc({ backend: lease.backend.kind, outcome: 'failure' });
      this.pool.remove(lease.id, toError(error));
      throw error;
    }

    if (this.abort.signal.aborted) {
      lease.backend.cancel();
      this.pool.release(lease.id);
      throw new Error('Recognition client closed');
    }

    this.stream = { generation, backend: lease.backend, lease };
    this.log.debug({ backend: lease.backend.getName(), leaseId: lease.id }, 'Recognizer stream opened');
    return this.stream;
  }

  private async openFallback(): Promise<ActiveStream | null> {
    const factory = this.options.fallbackFactory;
    if (!factory) {
      return null;
    }

    const backend = factory();
    const generation = ++this.generation;
    await this.startBackend(backend, generation);

    this.stream = { generation, backend };
    this.transitionTo('streaming');
    return this.stream;
  }

  private startBackend(backend: RecognitionBackend, generation: number): Promise<void> {
    if (!this.format) {
      throw new Error('Recognition client opened without an audio format');
    }

    return backend.startStream(
      (result) => this.handleResult(generation, result, backend.kind === 'synthetic'),
      (error) => this.handleStreamError(generation, error),
      {
        format: this.format,
        languageCode: this.streamOptions.languageCode ?? this.options.languageCode,
        enablePunctuation: this.options.enablePunctuation,
        enableWordOffsets: this.options.enableWordOffsets,
        interimResults: this.streamOptions.interimResults ?? this.options.interimResults,
      }
    );
  }

  private handleResult(generation: number, result: BackendResult, synthetic: boolean): void {
    const inFlight = this.inFlight;
    if (!inFlight || !this.stream || this.stream.generation !== generation) {
      this.log.debug({ generation, isFinal: result.isFinal }, 'Dropping result with no segment in flight');
      return;
    }

    const { work } = inFlight;
    const recognized: RecognitionResult = {
      segmentId: work.id,
      text: result.transcript,
      words: result.words ?? [],
      confidence: result.confidence ?? 0,
      isFinal: result.isFinal,
      processingTimeMs: Date.now() - (work.sealedAt ?? work.openedAt),
      synthetic,
    };

    if (!result.isFinal) {
      inFlight.sawPartial = true;
      this.events.push({ kind: 'partial', result: recognized });
      return;
    }

    this.clearInFlight(inFlight);
    segmentLatency.observe(recognized.processingTimeMs / 1000);
    this.events.push({ kind: 'final', result: recognized });
    inFlight.settle();
  }

  private handleStreamError(generation: number, error: Error): void {
    if (!this.stream || this.stream.generation !== generation || this.state === 'closing') {
      return;
    }

    this.log.warn({ err: error, generation }, 'Recognizer stream failed');

    const stream = this.stream;
    this.stream = null;
    if (stream.lease) {
      this.pool.remove(stream.lease.id, error);
    }
    stream.backend.cancel();

    const inFlight = this.inFlight;
    if (inFlight) {
      // At-most-once: the segment's audio is not replayed
      const segmentId = inFlight.work.id;
      this.clearInFlight(inFlight);
      this.fail(
        segmentId,
        new RecognitionStreamError(`Recognition stream failed during segment ${segmentId}: ${error.message}`, {
          segmentId,
        })
      );
      this.backoffToIdle(1).then(inFlight.settle, inFlight.settle);
      return;
    }

    this.backoffToIdle(1).catch((backoffError: unknown) => {
      this.log.debug({ err: toError(backoffError) }, 'Backoff interrupted');
    });
  }

  private handleTimeout(inFlight: InFlightSegment): void {
    if (this.inFlight !== inFlight) {
      return;
    }

    const segmentId = inFlight.work.id;
    this.clearInFlight(inFlight);
    this.fail(
      segmentId,
      new SegmentTimeoutError(segmentId, this.options.segmentTimeoutMs, inFlight.sawPartial ? 'final' : 'partial')
    );

    // Late results on this stream could not be attributed; start fresh
    this.teardownStream('segment timeout', false).then(inFlight.settle, inFlight.settle);
  }

  private async teardownStream(reason: string, graceful: boolean): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) {
      return;
    }

    try {
      if (graceful) {
        await stream.backend.endStream();
      } else {
        stream.backend.cancel();
      }
    } catch (error) {
      this.log.warn({ err: toError(error), reason }, 'Error ending recognizer stream');
      stream.backend.cancel();
    } finally {
      if (stream.lease) {
        this.pool.release(stream.lease.id);
      }
    }

    if (this.state !== 'closing') {
      this.transitionTo('idle');
    }
  }

  private async backoffToIdle(attempt: number): Promise<void> {
    this.transitionTo('failed');
    try {
      await sleep(
        backoffDelay(attempt, { baseDelayMs: this.options.retryBaseDelayMs, maxDelayMs: this.options.retryMaxDelayMs }),
        this.abort.signal
      );
    } catch {
      return; // closed during backoff
    }
    if (this.state === 'failed') {
      this.transitionTo('idle');
    }
  }

  private fail(segmentId: number, error: BridgeError): void {
    errorsTotal.inc({ code: error.code });
    this.events.push({ kind: 'failed', segmentId, error });
  }

  private clearInFlight(inFlight: InFlightSegment): void {
    if (inFlight.timer) {
      clearTimeout(inFlight.timer);
      inFlight.timer = undefined;
    }
    if (this.inFlight === inFlight) {
      this.inFlight = null;
    }
  }

  private transitionTo(next: ClientState): void {
    if (this.state === next) {
      return;
    }
    const previous = this.state;
    this.state = next;
    this.emit('state:changed', { from: previous, to: next });
  }
}
