/**
 * Health Monitoring Service
 *
 * Tracks request outcomes, latency percentiles, population volume and error
 * windows. Backs the /health endpoint and a Prometheus text export.
 */

import type {
  ErrorCode,
  ErrorMetrics,
  ErrorSample,
  HealthMetrics,
  PopulationMetrics,
  RequestMetrics,
} from './types.js';

export type RequestOutcome = 'resolved' | 'partial';

/**
 * Live view of the dedup cache, read at metrics time
 */
export interface PendingCacheProbe {
  readonly pendingCacheSize: number;
  readonly pendingCacheEvictions: number;
}

const MAX_LATENCY_SAMPLES = 10_000;
const MAX_ERROR_SAMPLES = 1_000;

export class HealthMonitor {
  private startTime: number;
  private requestCount = 0;
  private resolvedCount = 0;
  private partialCount = 0;
  private rejectedCount = 0;
  private failedCount = 0;
  private cellsRequested = 0;
  private latencies: number[] = [];
  private errors: ErrorSample[] = [];
  private readonly probe?: PendingCacheProbe;

  private readonly ERROR_WINDOW_5M = 5 * 60 * 1000;
  private readonly ERROR_WINDOW_1H = 60 * 60 * 1000;
  private readonly ERROR_WINDOW_24H = 24 * 60 * 60 * 1000;

  constructor(probe?: PendingCacheProbe) {
    this.startTime = Date.now();
    this.probe = probe;
  }

  /**
   * Record a request that produced an envelope
   */
  recordRequest(latencyMs: number, outcome: RequestOutcome, populationRequested: number): void {
    this.requestCount++;
    if (outcome === 'resolved') {
      this.resolvedCount++;
    } else {
      this.partialCount++;
    }
    this.cellsRequested += populationRequested;
    this.pushLatency(latencyMs);
  }

  /**
   * Record a caller error (4xx)
   */
  recordRejection(code: ErrorCode, message: string): void {
    this.requestCount++;
    this.rejectedCount++;
    this.pushError(code, message);
  }

  /**
   * Record a dependency or internal failure (5xx)
   */
  recordFailure(code: ErrorCode, message: string): void {
    this.requestCount++;
    this.failedCount++;
    this.pushError(code, message);
  }

  getMetrics(): HealthMetrics {
    const now = Date.now();
    const uptime = (now - this.startTime) / 1000;

    const requests: RequestMetrics = {
      total: this.requestCount,
      resolved: this.resolvedCount,
      partial: this.partialCount,
      rejected: this.rejectedCount,
      failed: this.failedCount,
      latencyP50: this.calculatePercentile(0.5),
      latencyP95: this.calculatePercentile(0.95),
      latencyP99: this.calculatePercentile(0.99),
      throughput: uptime > 0 ? this.requestCount / uptime : 0,
    };

    const population: PopulationMetrics = {
      cellsRequested: this.cellsRequested,
      pendingEntries: this.probe?.pendingCacheSize ?? 0,
      evictions: this.probe?.pendingCacheEvictions ?? 0,
    };

    const errors: ErrorMetrics = {
      last5m: this.countErrorsInWindow(now, this.ERROR_WINDOW_5M),
      last1h: this.countErrorsInWindow(now, this.ERROR_WINDOW_1H),
      last24h: this.countErrorsInWindow(now, this.ERROR_WINDOW_24H),
      recentErrors: this.errors.slice(-10),
    };

    return {
      status: this.determineHealthStatus(requests, errors),
      uptime,
      requests,
      population,
      errors,
      timestamp: now,
    };
  }

  /**
   * Export Prometheus-compatible metrics
   */
  exportPrometheus(): string {
    const metrics = this.getMetrics();
    const lines: string[] = [];

    lines.push('# HELP elevations_requests_total Elevation requests by outcome');
    lines.push('# TYPE elevations_requests_total counter');
    lines.push(`elevations_requests_total{outcome="resolved"} ${metrics.requests.resolved}`);
    lines.push(`elevations_requests_total{outcome="partial"} ${metrics.requests.partial}`);
    lines.push(`elevations_requests_total{outcome="rejected"} ${metrics.requests.rejected}`);
    lines.push(`elevations_requests_total{outcome="failed"} ${metrics.requests.failed}`);

    lines.push('# HELP elevations_request_latency_seconds Request latency percentiles');
    lines.push('# TYPE elevations_request_latency_seconds summary');
    lines.push(`elevations_request_latency_seconds{quantile="0.5"} ${metrics.requests.latencyP50 / 1000}`);
    lines.push(`elevations_request_latency_seconds{quantile="0.95"} ${metrics.requests.latencyP95 / 1000}`);
    lines.push(`elevations_request_latency_seconds{quantile="0.99"} ${metrics.requests.latencyP99 / 1000}`);

    lines.push('# HELP elevations_population_cells_total Cells sent to the populator');
    lines.push('# TYPE elevations_population_cells_total counter');
    lines.push(`elevations_population_cells_total ${metrics.population.cellsRequested}`);

    lines.push('# HELP elevations_pending_cache_entries Entries in the population dedup cache');
    lines.push('# TYPE elevations_pending_cache_entries gauge');
    lines.push(`elevations_pending_cache_entries ${metrics.population.pendingEntries}`);

    // 0=unhealthy, 1=degraded, 2=healthy
    lines.push('# HELP elevations_health Health status');
    lines.push('# TYPE elevations_health gauge');
    const healthValue = metrics.status === 'healthy' ? 2 : metrics.status === 'degraded' ? 1 : 0;
    lines.push(`elevations_health ${healthValue}`);

    return lines.join('\n') + '\n';
  }

  reset(): void {
    this.startTime = Date.now();
    this.requestCount = 0;
    this.resolvedCount = 0;
    this.partialCount = 0;
    this.rejectedCount = 0;
    this.failedCount = 0;
    this.cellsRequested = 0;
    this.latencies = [];
    this.errors = [];
  }

  private pushLatency(latencyMs: number): void {
    this.latencies.push(latencyMs);
    if (this.latencies.length > MAX_LATENCY_SAMPLES) {
      this.latencies.shift();
    }
  }

  private pushError(code: ErrorCode, error: string): void {
    this.errors.push({ timestamp: Date.now(), code, error });
    if (this.errors.length > MAX_ERROR_SAMPLES) {
      this.errors.shift();
    }
  }

  private calculatePercentile(p: number): number {
    if (this.latencies.length === 0) {
      return 0;
    }

    const sorted = [...this.latencies].sort((a, b) => a - b);
    const index = Math.ceil(sorted.length * p) - 1;
    return sorted[Math.max(0, index)];
  }

  private countErrorsInWindow(now: number, windowMs: number): number {
    const cutoff = now - windowMs;
    return this.errors.filter((e) => e.timestamp >= cutoff).length;
  }

  /**
   * Only 5xx failures count against health; caller errors say nothing about the service
   */
  private determineHealthStatus(
    requests: RequestMetrics,
    errors: ErrorMetrics
  ): 'healthy' | 'degraded' | 'unhealthy' {
    const recentFailures = errors.recentErrors.filter(
      (e) => e.code === 'DEPENDENCY_FAILURE' || e.code === 'INTERNAL_ERROR'
    ).length;

    if (recentFailures >= 5 || requests.latencyP99 > 5000) {
      return 'unhealthy';
    }
    if (recentFailures > 0 || requests.latencyP95 > 1000) {
      return 'degraded';
    }
    return 'healthy';
  }
}
