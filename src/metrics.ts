// Rolling latency metrics and lightweight counters
import { monitorEventLoopDelay } from 'node:perf_hooks';

const MAX_SAMPLES = 500;
const samples: number[] = [];
let c2xx = 0, c4xx = 0, c5xx = 0;

// Event loop delay histogram
const eld = monitorEventLoopDelay({ resolution: 10 });
eld.enable();

export function recordDurationMs(ms: number) {
  samples.push(ms);
  if (samples.length > MAX_SAMPLES) samples.shift();
}

export function recordStatus(code: number) {
  if (code >= 200 && code < 300) c2xx++; else if (code >= 400 && code < 500) c4xx++; else if (code >= 500) c5xx++;
}

export function snapshot() {
  return { c2xx, c4xx, c5xx };
}

function percentile(p: number): number {
  if (samples.length === 0) return 0;
  const sorted = [...samples].sort((a, b) => a - b);
  const idx = Math.min(sorted.length - 1, Math.floor(p * (sorted.length - 1)));
  return Math.round(sorted[idx] ?? 0);
}

export function p95Ms(): number {
  return percentile(0.95);
}

export function p99Ms(): number {
  return percentile(0.99);
}

export function eventLoopDelayMs(): number {
  // mean is in nanoseconds; NaN until the first sample lands
  const mean = eld.mean;
  return Number.isFinite(mean) ? Math.round(mean / 1e6) : 0;
}

// --- Task counters ---
let tasks_submitted = 0, tasks_duplicate = 0;
export function taskSubmitted(duplicate: boolean) {
  if (duplicate) tasks_duplicate++; else tasks_submitted++;
}

// --- Delivery counters (gateway) ---
export type DeliveryOutcome = 'delivered' | 'duplicate' | 'no_subscriber' | 'connection_gone' | 'remote_subscriber' | 'rejected';
const deliveries: Record<DeliveryOutcome, number> = {
  delivered: 0,
  duplicate: 0,
  no_subscriber: 0,
  connection_gone: 0,
  remote_subscriber: 0,
  rejected: 0,
};
export function recordDelivery(outcome: DeliveryOutcome) { deliveries[outcome]++; }

// --- Live connection gauge ---
let currentConnections = 0;
export function incConnections(): void { currentConnections++; }
export function decConnections(): void { currentConnections = Math.max(0, currentConnections - 1); }

export function getTaskCounters() {
  return {
    tasks_submitted,
    tasks_duplicate,
    deliveries: { ...deliveries },
    ws_connections: currentConnections,
  };
}
