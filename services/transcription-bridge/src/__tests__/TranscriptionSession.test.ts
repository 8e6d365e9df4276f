import { describe, it, expect, vi, afterEach } from 'vitest';
import { TranscriptionSession } from '../processing/TranscriptionSession';
import { RecognitionSessionClient } from '../recognition/RecognitionSessionClient';
import { BackendPool } from '../connection/BackendPool';
import type { PartialPolicy } from '../config';
import type { OutboundMessage, StartRecordingMessage } from '../protocol/messages';
import { FormatError } from '../errors';
import { RecognizerScript, sinePcm, silencePcm, toFrames } from './helpers';

interface SessionOverrides {
  partialPolicy?: PartialPolicy;
  drainTimeoutMs?: number;
  segmentTimeoutMs?: number;
  maxQueuedSegments?: number;
}

const cleanups: Array<() => Promise<void>> = [];

function createSession(script: RecognizerScript, overrides: SessionOverrides = {}) {
  const pool = new BackendPool(script.factory(), { idleTimeout: 0 });
  const sent: OutboundMessage[] = [];

  const session = new TranscriptionSession({
    connectionId: 'test-connection',
    vad: {
      vadThreshold: 0.02,
      minSpeechMs: 100,
      silenceDurationMs: 200,
      preSpeechPaddingMs: 300,
      maxSegmentMs: 30000,
    },
    drainTimeoutMs: overrides.drainTimeoutMs ?? 2000,
    partialPolicy: overrides.partialPolicy ?? 'latest',
    createClient: () =>
      new RecognitionSessionClient(pool, {
        retryBaseDelayMs: 10,
        segmentTimeoutMs: overrides.segmentTimeoutMs ?? 1000,
        maxQueuedSegments: overrides.maxQueuedSegments ?? 8,
      }),
    send: (message) => {
      sent.push(message);
    },
  });

  cleanups.push(async () => {
    await session.close();
    await pool.cleanup();
  });

  return { session, sent };
}

function startMessage(config: Record<string, unknown> = { sample_rate: 16000 }): StartRecordingMessage {
  const sampleRate = config.sample_rate;
  return {
    type: 'start_recording',
    config,
    sampleRate: typeof sampleRate === 'number' ? sampleRate : undefined,
  };
}

function ingest(session: TranscriptionSession, pcm: Buffer): void {
  for (const frame of toFrames(pcm)) {
    session.ingestAudio(frame);
  }
}

function ofType<T extends OutboundMessage['type']>(sent: OutboundMessage[], type: T) {
  return sent.filter((message): message is Extract<OutboundMessage, { type: T }> => message.type === type);
}

afterEach(async () => {
  for (const cleanup of cleanups.splice(0)) {
    await cleanup();
  }
});

describe('TranscriptionSession', () => {
  it('should acknowledge a duplicate start only once', async () => {
    const { session, sent } = createSession(new RecognizerScript());

    await session.start(startMessage());
    await session.start(startMessage());

    expect(sent).toEqual([{ type: 'recording_started', config: { sample_rate: 16000 } }]);
    expect(session.getState()).toBe('recording');
  });

  it('should refuse a sample rate other than 16 kHz', async () => {
    const { session, sent } = createSession(new RecognizerScript());

    await expect(session.start(startMessage({ sample_rate: 44100 }))).rejects.toThrow(FormatError);
    expect(sent).toEqual([]);
    expect(session.getState()).toBe('ready');
  });

  it('should turn 3 s of tone and a stop into exactly one segment and one final', async () => {
    const { session, sent } = createSession(new RecognizerScript());

    await session.start(startMessage());
    ingest(session, sinePcm(3000));
    await session.stop();

    const transcriptions = ofType(sent, 'transcription');
    expect(transcriptions).toHaveLength(1);
    expect(transcriptions[0]).toMatchObject({ segment_id: 1, text: 'utterance 1', is_final: true });
    expect(transcriptions[0].words).toEqual([
      { word: 'utterance', start: 0, end: 0.4, confidence: 0.95 },
      { word: '1', start: 0.5, end: 0.9, confidence: 0.95 },
    ]);

    expect(ofType(sent, 'recording_stopped')).toEqual([
      { type: 'recording_stopped', final_transcript: 'utterance 1', total_duration: 3, total_segments: 1 },
    ]);
    expect(session.getState()).toBe('ready');
  });

  it('should relay partials while the speaker is still talking', async () => {
    const script = new RecognizerScript(() => ({ partialOnAudio: 'still talking', final: 'long utterance' }));
    const { session, sent } = createSession(script);

    await session.start(startMessage());
    ingest(session, sinePcm(5000));

    await vi.waitFor(() => expect(ofType(sent, 'partial').length).toBeGreaterThan(0));
    expect(script.audioWrites).toBeGreaterThan(0);
    expect(script.utterances).toBe(0);
    expect(ofType(sent, 'partial')[0]).toEqual({
      type: 'partial',
      segment_id: 1,
      text: 'still talking',
      is_final: false,
    });
    expect(ofType(sent, 'transcription')).toEqual([]);

    await session.stop();

    expect(ofType(sent, 'transcription').map((message) => message.text)).toEqual(['long utterance']);
    expect(script.bytesReceived).toEqual([sinePcm(5000).length]);
    expect(sent.map((message) => message.type).indexOf('recording_stopped')).toBe(sent.length - 1);
  });

  it('should assemble the summary in segment order regardless of latency jitter', async () => {
    const latencies = [40, 5, 20];
    const script = new RecognizerScript((index) => ({ final: `echo ${index}`, latencyMs: latencies[index - 1] }));
    const { session, sent } = createSession(script);

    await session.start(startMessage());
    for (let i = 0; i < 3; i++) {
      ingest(session, sinePcm(400));
      ingest(session, silencePcm(300));
    }
    await session.stop();

    expect(ofType(sent, 'transcription').map((message) => message.segment_id)).toEqual([1, 2, 3]);

    const [summary] = ofType(sent, 'recording_stopped');
    expect(summary.final_transcript).toBe('echo 1 echo 2 echo 3');
    expect(summary.total_segments).toBe(3);

    // The summary is the last thing sent for the recording
    expect(sent[sent.length - 1]).toBe(summary);
  });

  it('should fail segments still outstanding at the drain deadline', async () => {
    const script = new RecognizerScript(() => ({ hang: true }));
    const { session, sent } = createSession(script, { drainTimeoutMs: 50, segmentTimeoutMs: 5000 });

    await session.start(startMessage());
    ingest(session, sinePcm(500));
    await session.stop();

    expect(sent.slice(1)).toEqual([
      { type: 'error', error: 'Segment 1 timed out after 50ms waiting for final result' },
      { type: 'recording_stopped', final_transcript: '', total_duration: 0.5, total_segments: 1 },
    ]);
  });

  it('should never emit a partial after the final of its segment', async () => {
    const script = new RecognizerScript(() => ({ partials: ['early'], final: 'done', latePartial: 'stale' }));
    const { session, sent } = createSession(script);

    await session.start(startMessage());
    ingest(session, sinePcm(400));
    ingest(session, silencePcm(300));

    await vi.waitFor(() => expect(ofType(sent, 'transcription')).toHaveLength(1));
    await new Promise((resolve) => setTimeout(resolve, 50));

    const types = sent.map((message) => message.type);
    expect(types).toEqual(['recording_started', 'partial', 'transcription']);
  });

  it('should suppress shrinking partials under the monotonic policy', async () => {
    const plan = () => ({ partials: ['hello there', 'hello'], final: 'hello there friend', latencyMs: 30 });
    const monotonic = createSession(new RecognizerScript(plan), { partialPolicy: 'monotonic' });
    const latest = createSession(new RecognizerScript(plan), { partialPolicy: 'latest' });

    for (const { session } of [monotonic, latest]) {
      await session.start(startMessage());
      ingest(session, sinePcm(400));
      await session.stop();
    }

    expect(ofType(monotonic.sent, 'partial').map((message) => message.text)).toEqual(['hello there']);
    expect(ofType(latest.sent, 'partial').map((message) => message.text)).toEqual(['hello there', 'hello']);
  });

  it('should surface a Busy rejection as an error envelope', async () => {
    const script = new RecognizerScript(() => ({ hang: true }));
    const { session, sent } = createSession(script, { maxQueuedSegments: 1, segmentTimeoutMs: 5000 });

    await session.start(startMessage());
    ingest(session, sinePcm(400));
    ingest(session, silencePcm(300));
    ingest(session, sinePcm(400));
    ingest(session, silencePcm(300));

    expect(ofType(sent, 'error')).toEqual([
      { type: 'error', error: 'Recognizer busy, segment 2 rejected (1 segments pending), retry later' },
    ]);
  });

  it('should drop audio that arrives outside a recording', () => {
    const { session, sent } = createSession(new RecognizerScript());

    session.ingestAudio(sinePcm(20));

    expect(sent).toEqual([]);
    expect(session.getSnapshot().framesDropped).toBe(1);
  });

  it('should ignore stop while ready', async () => {
    const { session, sent } = createSession(new RecognizerScript());

    await session.stop();

    expect(sent).toEqual([]);
    expect(session.getState()).toBe('ready');
  });

  it('should update VAD thresholds on configure and echo the applied values', () => {
    const { session, sent } = createSession(new RecognizerScript());

    session.configure({ type: 'configure', vadThreshold: 0.1, silenceDurationMs: 400 });
    session.configure({ type: 'configure', silenceDurationMs: 1500 });

    const { vadConfig } = session.getSnapshot().buffer;
    expect(vadConfig.vadThreshold).toBe(0.1);
    expect(vadConfig.silenceDurationMs).toBe(1500);
    expect(sent).toEqual([
      { type: 'configured', config: { vad_threshold: 0.1, silence_duration: 0.4 } },
      { type: 'configured', config: { vad_threshold: 0.1, silence_duration: 1.5 } },
    ]);
  });

  it('should stop without a summary when closed while draining', async () => {
    const script = new RecognizerScript(() => ({ hang: true }));
    const { session, sent } = createSession(script, { drainTimeoutMs: 5000, segmentTimeoutMs: 5000 });

    await session.start(startMessage());
    ingest(session, sinePcm(500));
    const stopping = session.stop();
    await session.close();
    await stopping;

    expect(ofType(sent, 'recording_stopped')).toEqual([]);
    expect(session.getState()).toBe('closed');
  });
});
