import {
  MetricsRegistry,
  type Counter,
  type Gauge,
  type Histogram,
} from '@callgate/core';

/**
 * The server's metric set, registered on one {@link MetricsRegistry} and
 * exposed on `GET /metrics`.
 */
export class ServerMetrics {
  readonly requestsTotal: Counter;
  readonly requestDuration: Histogram;
  readonly activeRequests: Gauge;
  readonly rateLimitExceeded: Counter;

  constructor(readonly registry: MetricsRegistry = new MetricsRegistry()) {
    this.requestsTotal = registry.counter(
      'rpc_requests_total',
      'Total number of RPC requests',
      ['method', 'status_code'],
    );
    this.requestDuration = registry.histogram(
      'rpc_request_duration_seconds',
      'Duration of RPC requests in seconds',
      ['method', 'status_code'],
    );
    this.activeRequests = registry.gauge(
      'rpc_active_requests',
      'Number of RPC requests currently being processed',
    );
    this.rateLimitExceeded = registry.counter(
      'rate_limit_exceeded_total',
      'Total number of requests rejected by rate limiting',
      ['method', 'key'],
    );
  }

  recordRateLimitExceeded(method: string, key: string): void {
    this.rateLimitExceeded.inc({ method, key });
  }

  render(): string {
    return this.registry.render();
  }
}
