import { Counter, Histogram, Registry } from 'prom-client';

export type MacAuthOutcome = 'ok' | 'missing' | 'malformed' | 'unknown_id' | 'invalid';

export class GatewayMetrics {
  private readonly registry: Registry;
  private readonly authRequests: Counter<string>;
  private readonly authLatency: Histogram<string>;

  constructor(registry?: Registry) {
    this.registry = registry ?? new Registry();
    this.authRequests = new Counter({
      name: 'mac_auth_requests_total',
      help: 'MAC authentication attempts by outcome',
      labelNames: ['outcome'],
      registers: [this.registry]
    });

    this.authLatency = new Histogram({
      name: 'mac_auth_latency_ms',
      help: 'Time spent authenticating a request',
      buckets: [0.1, 0.5, 1, 2, 5, 10, 25, 50, 100],
      registers: [this.registry]
    });
  }

  recordAuth(outcome: MacAuthOutcome, durationMs: number) {
    this.authRequests.labels(outcome).inc();
    this.authLatency.observe(durationMs);
  }

  getRegistry() {
    return this.registry;
  }
}
