/**
 * Prometheus Metrics
 *
 * Provides application metrics for monitoring:
 * - HTTP request counters and duration histograms
 * - Namecheap command counters
 * - Function call counters by outcome
 */

import { Registry, Counter, Histogram } from 'prom-client';

/**
 * Prometheus registry
 */
export const register = new Registry();

/**
 * HTTP request counter
 * Labels: route, method, status
 */
export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['route', 'method', 'status'],
  registers: [register],
});

/**
 * HTTP request duration histogram
 * Labels: route, method
 */
export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['route', 'method'],
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register],
});

/**
 * Namecheap API call counter
 * Labels: command, status (success/rejected/transport_error)
 */
export const namecheapCallsTotal = new Counter({
  name: 'namecheap_calls_total',
  help: 'Total number of Namecheap API calls',
  labelNames: ['command', 'status'],
  registers: [register],
});

/**
 * Function call counter
 * Labels: function, outcome (ok or the error name)
 */
export const functionCallsTotal = new Counter({
  name: 'function_calls_total',
  help: 'Total number of function invocations',
  labelNames: ['function', 'outcome'],
  registers: [register],
});

export type NamecheapCallStatus = 'success' | 'rejected' | 'transport_error';

/**
 * Helper: Increment HTTP request counter
 */
export function incHttpRequest(route: string, method: string, status: number): void {
  httpRequestsTotal.inc({
    route,
    method,
    status: String(status),
  });
}

/**
 * Helper: Observe HTTP request duration
 */
export function observeHttpDuration(route: string, method: string, durationSeconds: number): void {
  httpRequestDuration.observe({ route, method }, durationSeconds);
}

/**
 * Helper: Increment Namecheap call counter
 */
export function incNamecheapCall(command: string, status: NamecheapCallStatus): void {
  namecheapCallsTotal.inc({ command, status });
}

/**
 * Helper: Increment function call counter
 */
export function incFunctionCall(name: string, outcome: string): void {
  functionCallsTotal.inc({ function: name, outcome });
}

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Reset all metric values (for testing)
 */
export function resetMetrics(): void {
  register.resetMetrics();
}
