/**
 * Voice Activity Detector
 * Energy-based VAD for detecting speech vs silence in 16-bit PCM audio.
 * Time is measured in audio milliseconds, not wall clock, so decisions only
 * depend on the samples themselves.
 */

import { EventEmitter } from 'node:events';

export interface VADConfig {
  sampleRate?: number;
  vadThreshold?: number; // RMS energy in [0, 1]
  minSpeechMs?: number; // onset hold time
  silenceDurationMs?: number; // trailing silence that ends speech
}

export type VADState = 'silence' | 'onset' | 'speech';

export type VADTransition = 'none' | 'onset' | 'onset-rejected' | 'speech-start' | 'speech-end';

export interface VADResult {
  isSpeech: boolean; // this chunk alone is above threshold
  energy: number;
  state: VADState;
  transition: VADTransition;
}

export class VoiceActivityDetector extends EventEmitter {
  private config: Required<VADConfig>;
  private state: VADState = 'silence';
  private onsetMs: number = 0;
  private silenceMs: number = 0;
  private speechMs: number = 0;
  private processedMs: number = 0;
  private lastEnergyValues: number[] = [];

  constructor(config: VADConfig = {}) {
    super();

    this.config = {
      sampleRate: config.sampleRate ?? 16000,
      vadThreshold: config.vadThreshold ?? 0.02,
      minSpeechMs: config.minSpeechMs ?? 100,
      silenceDurationMs: config.silenceDurationMs ?? 800,
    };
  }

  /**
   * Process an audio chunk and detect voice activity
   */
  process(audioChunk: Buffer): VADResult {
    const energy = this.calculateEnergy(audioChunk);
    const chunkMs = this.chunkDurationMs(audioChunk);
    const isSpeech = energy > this.config.vadThreshold;

    this.processedMs += chunkMs;
    this.lastEnergyValues.push(energy);
    if (this.lastEnergyValues.length > 100) {
      this.lastEnergyValues.shift();
    }

    const transition = isSpeech
      ? this.handleSpeechDetected(chunkMs, energy)
      : this.handleSilenceDetected(chunkMs);

    return { isSpeech, energy, state: this.state, transition };
  }

  /**
   * Treat the detector as mid-utterance, used after a forced segment cut
   */
  continueSpeech(): void {
    this.state = 'speech';
    this.onsetMs = 0;
    this.silenceMs = 0;
  }

  /**
   * Reset VAD state
   */
  reset(): void {
    this.state = 'silence';
    this.onsetMs = 0;
    this.silenceMs = 0;
    this.speechMs = 0;
    this.lastEnergyValues = [];
  }

  getState(): VADState {
    return this.state;
  }

  getConfig(): Required<VADConfig> {
    return { ...this.config };
  }

  /**
   * Update thresholds in place; the current state is kept
   */
  updateConfig(config: Partial<VADConfig>): void {
    this.config = {
      sampleRate: config.sampleRate ?? this.config.sampleRate,
      vadThreshold: config.vadThreshold ?? this.config.vadThreshold,
      minSpeechMs: config.minSpeechMs ?? this.config.minSpeechMs,
      silenceDurationMs: config.silenceDurationMs ?? this.config.silenceDurationMs,
    };
  }

  getStats() {
    return {
      state: this.state,
      onsetMs: this.onsetMs,
      silenceMs: this.silenceMs,
      speechMs: this.speechMs,
      processedMs: this.processedMs,
      threshold: this.config.vadThreshold,
      lastEnergyValues: this.lastEnergyValues.slice(-10),
    };
  }

  /**
   * Private: RMS energy of a 16-bit little-endian chunk, normalised to [0, 1]
   */
  private calculateEnergy(audioChunk: Buffer): number {
    const samples = Math.floor(audioChunk.length / 2);
    if (samples === 0) {
      return 0;
    }

    let sum = 0;
    for (let i = 0; i + 1 < audioChunk.length; i += 2) {
      const sample = audioChunk.readInt16LE(i) / 32768.0;
      sum += sample * sample;
    }

    return Math.sqrt(sum / samples);
  }

  private chunkDurationMs(audioChunk: Buffer): number {
    return (Math.floor(audioChunk.length / 2) / this.config.sampleRate) * 1000;
  }

  private handleSpeechDetected(chunkMs: number, energy: number): VADTransition {
    this.silenceMs = 0;

    if (this.state === 'speech') {
      this.speechMs += chunkMs;
      return 'none';
    }

    const firstLoudChunk = this.state === 'silence';
    this.onsetMs += chunkMs;

    if (this.onsetMs >= this.config.minSpeechMs) {
      this.state = 'speech';
      this.speechMs = this.onsetMs;
      this.onsetMs = 0;
      this.emit('speech:start', { energy, atMs: this.processedMs });
      return 'speech-start';
    }

    this.state = 'onset';
    return firstLoudChunk ? 'onset' : 'none';
  }

  private handleSilenceDetected(chunkMs: number): VADTransition {
    if (this.state === 'onset') {
      // Loud burst shorter than the hold time
      this.state = 'silence';
      this.onsetMs = 0;
      return 'onset-rejected';
    }

    if (this.state === 'silence') {
      return 'none';
    }

    this.silenceMs += chunkMs;

    if (this.silenceMs >= this.config.silenceDurationMs) {
      const speechDuration = this.speechMs;
      this.state = 'silence';
      this.silenceMs = 0;
      this.speechMs = 0;
      this.emit('speech:end', { speechDuration, atMs: this.processedMs });
      return 'speech-end';
    }

    return 'none';
  }
}
