/**
 * Audio Frame Buffer
 * Accumulates PCM frames for one connection and cuts them into
 * VAD-delimited segments ready for the recognizer.
 */

import { EventEmitter } from 'node:events';
import { VoiceActivityDetector } from './VoiceActivityDetector';
import {
  AudioFormat,
  AudioFrame,
  AudioSegment,
  NEGOTIATED_FORMAT,
  SealReason,
  SegmentAudio,
  assertFrameFormat,
  durationMs,
} from '../audio/AudioFormat';

export interface AudioFrameBufferConfig {
  format?: AudioFormat;
  vadThreshold?: number;
  minSpeechMs?: number;
  silenceDurationMs?: number;
  preSpeechPaddingMs?: number;
  maxSegmentMs?: number;
}

export interface ThresholdUpdate {
  vadThreshold?: number;
  silenceDurationMs?: number;
}

interface OpenSegment {
  id?: number; // assigned once the segment holds speech
  frames: AudioFrame[];
  byteLength: number;
  durationMs: number;
  startedAt: number;
}

/**
 * Events:
 * - 'segment:opened' (SegmentAudio): speech started; carries the padding and
 *   onset frames
 * - 'segment:audio' (SegmentAudio): one more frame of the open segment
 * - 'segment:sealed' (AudioSegment): the segment is complete
 */
export class AudioFrameBuffer extends EventEmitter {
  private vad: VoiceActivityDetector;
  private format: AudioFormat;
  private preSpeechPaddingMs: number;
  private maxSegmentMs: number;
  private preSpeech: AudioFrame[] = [];
  private onsetFrames: AudioFrame[] = [];
  private current: OpenSegment | null = null;
  private nextSegmentId: number = 1;
  private segmentsSealed: number = 0;
  private totalAudioMs: number = 0;

  constructor(config: AudioFrameBufferConfig = {}) {
    super();

    this.format = config.format ?? NEGOTIATED_FORMAT;
    this.preSpeechPaddingMs = config.preSpeechPaddingMs ?? 300;
    this.maxSegmentMs = config.maxSegmentMs ?? 30000;

    this.vad = new VoiceActivityDetector({
      sampleRate: this.format.sampleRate,
      vadThreshold: config.vadThreshold,
      minSpeechMs: config.minSpeechMs,
      silenceDurationMs: config.silenceDurationMs,
    });

    this.vad.on('speech:start', (event) => {
      this.emit('speech:start', event);
    });

    this.vad.on('speech:end', (event) => {
      this.emit('speech:end', event);
    });
  }

  /**
   * Consume one frame, returning the segments it sealed (usually none)
   */
  ingest(frame: AudioFrame): AudioSegment[] {
    assertFrameFormat(frame, this.format);

    const frameMs = durationMs(frame.data.length, this.format);
    this.totalAudioMs += frameMs;

    const result = this.vad.process(frame.data);
    const sealed: AudioSegment[] = [];

    switch (result.transition) {
      case 'onset':
        this.onsetFrames = [frame];
        break;
      case 'onset-rejected':
        for (const pending of this.onsetFrames) {
          this.pushPreSpeech(pending);
        }
        this.onsetFrames = [];
        this.pushPreSpeech(frame);
        break;
      case 'speech-start':
        this.openSegment([...this.preSpeech, ...this.onsetFrames, frame]);
        this.preSpeech = [];
        this.onsetFrames = [];
        break;
      case 'speech-end':
        if (this.current) {
          this.appendFrame(frame, false);
          const segment = this.seal('silence');
          if (segment) {
            sealed.push(segment);
          }
        }
        break;
      case 'none':
        if (result.state === 'speech' && this.current) {
          this.appendFrame(frame, result.isSpeech);
        } else if (result.state === 'onset') {
          this.onsetFrames.push(frame);
        } else {
          this.pushPreSpeech(frame);
        }
        break;
    }

    if (this.current && this.current.durationMs >= this.maxSegmentMs) {
      const segment = this.seal('max-duration');
      if (segment) {
        sealed.push(segment);
      }
      // Keep listening as mid-utterance; the next frame opens a new segment
      this.vad.continueSpeech();
      this.current = this.emptySegment();
    }

    return sealed;
  }

  /**
   * Seal whatever speech is buffered, even mid-utterance (explicit stop)
   */
  flush(): AudioSegment | null {
    if (!this.current && this.onsetFrames.length > 0) {
      // Unconfirmed onset still counts as speech when the client stops
      this.openSegment([...this.preSpeech, ...this.onsetFrames]);
    }

    const segment = this.current ? this.seal('stop') : null;

    this.vad.reset();
    this.preSpeech = [];
    this.onsetFrames = [];
    this.current = null;

    return segment;
  }

  /**
   * Update VAD thresholds without disturbing the open segment
   */
  configure(update: ThresholdUpdate): void {
    this.vad.updateConfig({
      vadThreshold: update.vadThreshold,
      silenceDurationMs: update.silenceDurationMs,
    });
  }

  /**
   * Release all buffered audio
   */
  reset(): void {
    this.vad.reset();
    this.preSpeech = [];
    this.onsetFrames = [];
    this.current = null;
    this.totalAudioMs = 0;
  }

  /**
   * Audio received since creation or the last reset, in seconds
   */
  getTotalDurationSeconds(): number {
    return this.totalAudioMs / 1000;
  }

  getSegmentsSealed(): number {
    return this.segmentsSealed;
  }

  getStats() {
    return {
      vadState: this.vad.getState(),
      openSegmentMs: this.current?.durationMs ?? 0,
      bufferedBytes:
        (this.current?.byteLength ?? 0) +
        this.preSpeech.reduce((sum, frame) => sum + frame.data.length, 0) +
        this.onsetFrames.reduce((sum, frame) => sum + frame.data.length, 0),
      segmentsSealed: this.getSegmentsSealed(),
      vadConfig: this.vad.getConfig(),
      vadStats: this.vad.getStats(),
    };
  }

  private openSegment(frames: AudioFrame[]): void {
    const byteLength = frames.reduce((sum, frame) => sum + frame.data.length, 0);
    this.current = {
      frames,
      byteLength,
      durationMs: durationMs(byteLength, this.format),
      startedAt: frames.length > 0 ? frames[0].receivedAt : Date.now(),
    };
    this.goLive(this.current);
  }

  private emptySegment(): OpenSegment {
    return { frames: [], byteLength: 0, durationMs: 0, startedAt: Date.now() };
  }

  private appendFrame(frame: AudioFrame, isSpeech: boolean): void {
    const open = this.current;
    if (!open) {
      return;
    }
    if (open.frames.length === 0) {
      open.startedAt = frame.receivedAt;
    }
    open.frames.push(frame);
    open.byteLength += frame.data.length;
    open.durationMs += durationMs(frame.data.length, this.format);

    if (open.id !== undefined) {
      const audio: SegmentAudio = { segmentId: open.id, frames: [frame] };
      this.emit('segment:audio', audio);
    } else if (isSpeech) {
      this.goLive(open);
    }
  }

  /**
   * Private: number the segment and announce everything buffered so far
   */
  private goLive(open: OpenSegment): void {
    open.id = this.nextSegmentId++;
    const audio: SegmentAudio = { segmentId: open.id, frames: [...open.frames] };
    this.emit('segment:opened', audio);
  }

  private pushPreSpeech(frame: AudioFrame): void {
    this.preSpeech.push(frame);

    let bufferedMs = this.preSpeech.reduce((sum, f) => sum + durationMs(f.data.length, this.format), 0);
    while (this.preSpeech.length > 0 && bufferedMs > this.preSpeechPaddingMs) {
      const dropped = this.preSpeech.shift();
      bufferedMs -= dropped ? durationMs(dropped.data.length, this.format) : 0;
    }
  }

  /**
   * Private: close the open segment; segments that never held speech are
   * dropped and did not consume a sequence number
   */
  private seal(reason: SealReason): AudioSegment | null {
    const open = this.current;
    this.current = null;

    if (!open || open.id === undefined) {
      return null;
    }

    this.segmentsSealed++;
    const segment: AudioSegment = Object.freeze({
      id: open.id,
      frames: Object.freeze([...open.frames]),
      durationMs: open.durationMs,
      byteLength: open.byteLength,
      startedAt: open.startedAt,
      sealedAt: Date.now(),
      sealReason: reason,
    });

    this.emit('segment:sealed', segment);
    return segment;
  }
}
