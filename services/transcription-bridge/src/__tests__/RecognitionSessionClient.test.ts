import { describe, it, expect, vi, afterEach } from 'vitest';
import { RecognitionSessionClient } from '../recognition/RecognitionSessionClient';
import type { RecognitionClientOptions, RecognitionEvent } from '../recognition/RecognitionSessionClient';
import { BackendPool } from '../connection/BackendPool';
import { NEGOTIATED_FORMAT } from '../audio/AudioFormat';
import { SyntheticRecognitionBackend, SYNTHETIC_MARKER } from '../providers/SyntheticRecognitionBackend';
import { BackendUnavailableError, BusyError, RecognitionStreamError, SegmentTimeoutError } from '../errors';
import { RecognizerScript, makeSegment } from './helpers';

interface Harness {
  client: RecognitionSessionClient;
  pool: BackendPool;
  events: RecognitionEvent[];
  done: Promise<void>;
}

const harnesses: Harness[] = [];

async function openClient(script: RecognizerScript, options: RecognitionClientOptions = {}): Promise<Harness> {
  const pool = new BackendPool(script.factory(), { idleTimeout: 0 });
  const client = new RecognitionSessionClient(pool, {
    retryBaseDelayMs: 10,
    retryMaxDelayMs: 100,
    segmentTimeoutMs: 1000,
    ...options,
  });
  await client.open(NEGOTIATED_FORMAT);

  const events: RecognitionEvent[] = [];
  const done = (async () => {
    for await (const event of client.results()) {
      events.push(event);
    }
  })();

  const harness = { client, pool, events, done };
  harnesses.push(harness);
  return harness;
}

function finals(events: RecognitionEvent[]) {
  return events.flatMap((event) => (event.kind === 'final' ? [event.result] : []));
}

function failures(events: RecognitionEvent[]) {
  return events.flatMap((event) => (event.kind === 'failed' ? [event] : []));
}

afterEach(async () => {
  for (const harness of harnesses.splice(0)) {
    await harness.client.close();
    await harness.done;
    await harness.pool.cleanup();
  }
});

describe('RecognitionSessionClient', () => {
  it('should stream a segment and deliver its partial and final', async () => {
    const script = new RecognizerScript(() => ({ partials: ['hello'], final: 'hello world', latencyMs: 20 }));
    const { client, events } = await openClient(script);

    client.send(makeSegment(1));

    await vi.waitFor(() => expect(finals(events)).toHaveLength(1));
    expect(events.map((event) => event.kind)).toEqual(['partial', 'final']);

    const [result] = finals(events);
    expect(result.segmentId).toBe(1);
    expect(result.text).toBe('hello world');
    expect(result.synthetic).toBe(false);
    expect(result.words.map((word) => word.word)).toEqual(['hello', 'world']);
    expect(client.getState()).toBe('streaming');
  });

  it('should write the segment in chunks of the configured size', async () => {
    const script = new RecognizerScript();
    const { client, events } = await openClient(script, { chunkSizeBytes: 1000 });

    // 200 ms = 6400 bytes
    client.send(makeSegment(1, 200));

    await vi.waitFor(() => expect(finals(events)).toHaveLength(1));
    expect(script.bytesReceived).toEqual([6400]);
  });

  it('should reuse one backend stream for consecutive segments', async () => {
    const script = new RecognizerScript();
    const { client, events } = await openClient(script);

    client.send(makeSegment(1));
    client.send(makeSegment(2));

    await vi.waitFor(() => expect(finals(events)).toHaveLength(2));
    expect(finals(events).map((result) => [result.segmentId, result.text])).toEqual([
      [1, 'utterance 1'],
      [2, 'utterance 2'],
    ]);
    expect(script.connects).toBe(1);
  });

  it('should retry a failed connect and deliver exactly one final', async () => {
    const script = new RecognizerScript();
    script.connectFailures = 1;
    const { client, events } = await openClient(script, { retryBaseDelayMs: 50 });

    client.send(makeSegment(1));

    await vi.waitFor(() => expect(finals(events)).toHaveLength(1));
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(script.connects).toBe(2);
    expect(finals(events)).toHaveLength(1);
    expect(failures(events)).toEqual([]);
    // Latency runs from submission, so it includes the backoff
    expect(finals(events)[0].processingTimeMs).toBeGreaterThanOrEqual(50);
  });

  it('should fail the segment when the backend stays unreachable in reject mode', async () => {
    const script = new RecognizerScript();
    script.connectFailures = Number.MAX_SAFE_INTEGER;
    const { client, events } = await openClient(script, { maxRetries: 1, degradedMode: 'reject' });

    client.send(makeSegment(1));

    await vi.waitFor(() => expect(failures(events)).toHaveLength(1));
    const [failure] = failures(events);
    expect(failure.segmentId).toBe(1);
    expect(failure.error).toBeInstanceOf(BackendUnavailableError);
    expect(failure.error.code).toBe('BACKEND_UNAVAILABLE');
    expect(failure.error.message).toBe(
      'Recognition backend recognizer unavailable after 2 attempt(s): connection refused'
    );
    expect(script.connects).toBe(2);
    expect(client.isDegraded()).toBe(false);
  });

  it('should back off in the failed state before going idle in reject mode', async () => {
    const script = new RecognizerScript();
    script.connectFailures = Number.MAX_SAFE_INTEGER;
    const { client, events } = await openClient(script, { maxRetries: 0, retryBaseDelayMs: 100 });
    const states: string[] = [];
    client.on('state:changed', ({ to }: { to: string }) => states.push(to));

    client.send(makeSegment(1));

    await vi.waitFor(() => expect(failures(events)).toHaveLength(1));
    expect(client.getState()).toBe('failed');

    await vi.waitFor(() => expect(client.getState()).toBe('idle'));
    expect(states).toEqual(['connecting', 'failed', 'idle']);
  });

  it('should fall back to a marked synthetic transcript in synthetic mode', async () => {
    const script = new RecognizerScript();
    script.connectFailures = Number.MAX_SAFE_INTEGER;
    const { client, events } = await openClient(script, {
      maxRetries: 1,
      degradedMode: 'synthetic',
      fallbackFactory: () => new SyntheticRecognitionBackend({ latencyMs: 5, partials: 0, text: 'stand-in' }),
    });

    client.send(makeSegment(1));

    await vi.waitFor(() => expect(finals(events)).toHaveLength(1));
    const [result] = finals(events);
    expect(result.text).toBe(`${SYNTHETIC_MARKER} stand-in`);
    expect(result.synthetic).toBe(true);
    expect(client.isDegraded()).toBe(true);
    expect(failures(events)).toEqual([]);
  });

  it('should time out a silent segment and recover on a fresh stream', async () => {
    const script = new RecognizerScript((index) => (index === 1 ? { hang: true } : { final: 'recovered' }));
    const { client, events } = await openClient(script, { segmentTimeoutMs: 50 });

    client.send(makeSegment(1));
    client.send(makeSegment(2));

    await vi.waitFor(() => expect(finals(events)).toHaveLength(1));

    const [failure] = failures(events);
    expect(failure.segmentId).toBe(1);
    expect(failure.error).toBeInstanceOf(SegmentTimeoutError);
    expect(failure.error.message).toBe('Segment 1 timed out after 50ms waiting for partial result');

    expect(finals(events)[0].segmentId).toBe(2);
    expect(finals(events)[0].text).toBe('recovered');
    expect(script.connects).toBe(2);
  });

  it('should report a timeout after a partial as waiting for the final', async () => {
    // Partial due at 100 ms, final at 200 ms, deadline at 150 ms
    const script = new RecognizerScript(() => ({ partials: ['almost'], final: 'too late', latencyMs: 200 }));
    const { client, events } = await openClient(script, { segmentTimeoutMs: 150 });

    client.send(makeSegment(1));

    await vi.waitFor(() => expect(failures(events)).toHaveLength(1));
    expect(events.map((event) => event.kind)).toEqual(['partial', 'failed']);
    expect(failures(events)[0].error.message).toBe('Segment 1 timed out after 150ms waiting for final result');

    // The cancelled stream never delivers the late final
    await new Promise((resolve) => setTimeout(resolve, 100));
    expect(finals(events)).toEqual([]);
  });

  it('should fail only the in-flight segment when the stream breaks', async () => {
    const script = new RecognizerScript((index) => (index === 1 ? { fail: 'transport closed' } : { final: 'next one' }));
    const { client, events } = await openClient(script);

    client.send(makeSegment(1));
    client.send(makeSegment(2));

    await vi.waitFor(() => expect(finals(events)).toHaveLength(1));

    const [failure] = failures(events);
    expect(failure.segmentId).toBe(1);
    expect(failure.error).toBeInstanceOf(RecognitionStreamError);
    expect(failure.error.message).toBe('Recognition stream failed during segment 1: transport closed');
    expect(finals(events)[0].segmentId).toBe(2);
    // The broken backend was removed from the pool and a new one opened
    expect(script.connects).toBe(2);
    expect(script.utterances).toBe(2);
  });

  it('should reject a segment with Busy once the queue is full', async () => {
    const script = new RecognizerScript(() => ({ hang: true }));
    const { client } = await openClient(script, { maxQueuedSegments: 2 });

    client.send(makeSegment(1));
    client.send(makeSegment(2));

    let thrown: unknown;
    try {
      client.send(makeSegment(3));
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(BusyError);
    expect(thrown).toMatchObject({
      message: 'Recognizer busy, segment 3 rejected (2 segments pending), retry later',
    });
    expect(client.pendingCount()).toBe(2);

    // The rejected segment's remaining audio is dropped, not queued
    client.send({ segmentId: 3, frames: makeSegment(3).frames });
    expect(client.pendingCount()).toBe(2);
  });

  it('should stream an open segment before it is sealed', async () => {
    const script = new RecognizerScript(() => ({ partialOnAudio: 'still talking', final: 'all done' }));
    const { client, events } = await openClient(script, { chunkSizeBytes: 1280, segmentTimeoutMs: 50 });
    const segment = makeSegment(1, 400);

    client.send({ segmentId: 1, frames: segment.frames.slice(0, 10) });

    await vi.waitFor(() => expect(events.map((event) => event.kind)).toContain('partial'));
    expect(script.audioWrites).toBe(5);
    expect(script.utterances).toBe(0);

    // Longer than the segment timeout: nothing is due before the seal
    await new Promise((resolve) => setTimeout(resolve, 80));
    expect(failures(events)).toEqual([]);

    client.send({ segmentId: 1, frames: segment.frames.slice(10) });
    client.send(segment);

    await vi.waitFor(() => expect(finals(events)).toHaveLength(1));
    expect(finals(events)[0].text).toBe('all done');
    expect(script.bytesReceived).toEqual([segment.byteLength]);
    expect(script.audioWrites).toBe(10);
  });

  it('should queue the next segment behind one that is still open', async () => {
    const script = new RecognizerScript();
    const { client, events } = await openClient(script);
    const first = makeSegment(1);
    const second = makeSegment(2);

    client.send({ segmentId: 1, frames: first.frames });
    client.send(second);
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(script.utterances).toBe(0);
    expect(finals(events)).toEqual([]);

    client.send(first);

    await vi.waitFor(() => expect(finals(events)).toHaveLength(2));
    expect(finals(events).map((result) => [result.segmentId, result.text])).toEqual([
      [1, 'utterance 1'],
      [2, 'utterance 2'],
    ]);
  });

  it('should not allow results() to be consumed twice', async () => {
    const { client } = await openClient(new RecognizerScript());

    expect(() => client.results()).toThrow('results() can only be consumed once');
  });

  it('should abandon the in-flight segment on close and end the result sequence', async () => {
    const script = new RecognizerScript(() => ({ hang: true }));
    const harness = await openClient(script);

    harness.client.send(makeSegment(1));
    await vi.waitFor(() => expect(script.utterances).toBe(1));

    await harness.client.close();
    await harness.done;

    expect(harness.events).toEqual([]);
    expect(harness.client.getState()).toBe('idle');
    expect(harness.pool.getStats().inUse).toBe(0);
    expect(() => harness.client.send(makeSegment(2))).toThrow('Recognition client is not open');
  });
});
