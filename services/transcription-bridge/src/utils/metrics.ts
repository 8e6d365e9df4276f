import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';

// Create a custom registry
export const register = new Registry();

// Collect default metrics (CPU, memory, event loop lag)
collectDefaultMetrics({
  register,
  prefix: 'transcription_bridge_',
});

// Client connections
export const connectionsTotal = new Counter({
  name: 'bridge_connections_total',
  help: 'Total number of client connections',
  labelNames: ['status'],
  registers: [register],
});

export const connectionsActive = new Gauge({
  name: 'bridge_connections_active',
  help: 'Number of currently open client connections',
  registers: [register],
});

// Audio ingestion
export const audioBytesReceived = new Counter({
  name: 'bridge_audio_bytes_received_total',
  help: 'Total bytes of PCM audio received from clients',
  registers: [register],
});

export const framesDropped = new Counter({
  name: 'bridge_audio_frames_dropped_total',
  help: 'Audio frames dropped because no recording was active',
  registers: [register],
});

// Segmentation and recognition
export const segmentsSealed = new Counter({
  name: 'bridge_segments_sealed_total',
  help: 'Audio segments sealed by voice activity detection',
  labelNames: ['reason'],
  registers: [register],
});

export const resultsEmitted = new Counter({
  name: 'bridge_results_emitted_total',
  help: 'Recognition results sent to clients',
  labelNames: ['kind'],
  registers: [register],
});

export const backendConnectAttempts = new Counter({
  name: 'bridge_backend_connect_attempts_total',
  help: 'Attempts to open a recognition backend stream',
  labelNames: ['backend', 'outcome'],
  registers: [register],
});

export const segmentLatency = new Histogram({
  name: 'bridge_segment_processing_seconds',
  help: 'Time from segment submission to final result',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [register],
});

// Error metrics
export const errorsTotal = new Counter({
  name: 'bridge_errors_total',
  help: 'Total number of errors surfaced or logged',
  labelNames: ['code'],
  registers: [register],
});

// Status endpoints
export const httpRequestDuration = new Histogram({
  name: 'bridge_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});
