/**
 * PCM audio contract shared by the gateway, the segmenter and the backends
 */

import { FormatError } from '../errors';

export interface AudioFormat {
  sampleRate: number;
  channels: number;
  bitDepth: number;
}

export const NEGOTIATED_FORMAT: Readonly<AudioFormat> = Object.freeze({
  sampleRate: 16000,
  channels: 1,
  bitDepth: 16,
});

export interface AudioFrame {
  readonly data: Buffer;
  readonly receivedAt: number;
}

export interface AudioSegment {
  readonly id: number;
  readonly frames: readonly AudioFrame[];
  readonly durationMs: number;
  readonly byteLength: number;
  readonly startedAt: number;
  readonly sealedAt: number;
  readonly sealReason: SealReason;
}

/** Audio of a segment that is still open, in arrival order */
export interface SegmentAudio {
  readonly segmentId: number;
  readonly frames: readonly AudioFrame[];
}

export type SealReason = 'silence' | 'stop' | 'max-duration';

export function bytesPerSample(format: AudioFormat): number {
  return (format.bitDepth / 8) * format.channels;
}

export function durationMs(byteLength: number, format: AudioFormat = NEGOTIATED_FORMAT): number {
  return (byteLength / bytesPerSample(format) / format.sampleRate) * 1000;
}

export function createFrame(data: Buffer, receivedAt: number = Date.now()): AudioFrame {
  return Object.freeze({ data, receivedAt });
}

/**
 * Throws FormatError unless the frame holds whole samples of the format
 */
export function assertFrameFormat(frame: AudioFrame, format: AudioFormat = NEGOTIATED_FORMAT): void {
  const sampleBytes = bytesPerSample(format);

  if (frame.data.length === 0) {
    throw new FormatError('Empty audio frame');
  }

  if (frame.data.length % sampleBytes !== 0) {
    throw new FormatError(
      `Audio frame of ${frame.data.length} bytes is not whole ${format.bitDepth}-bit ${format.channels === 1 ? 'mono' : `${format.channels}-channel`} samples`,
      { byteLength: frame.data.length }
    );
  }
}

/**
 * Same format on every axis
 */
export function sameFormat(a: AudioFormat, b: AudioFormat): boolean {
  return a.sampleRate === b.sampleRate && a.channels === b.channels && a.bitDepth === b.bitDepth;
}

/**
 * Concatenate a segment's frames into one PCM buffer
 */
export function segmentAudio(segment: AudioSegment): Buffer {
  return Buffer.concat(segment.frames.map((frame) => frame.data), segment.byteLength);
}
