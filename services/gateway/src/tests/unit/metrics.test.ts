import { Registry } from 'prom-client';
import { describe, expect, it } from 'vitest';
import { GatewayMetrics } from '../../observability/metrics';

describe('GatewayMetrics', () => {
  it('counts authentication outcomes', async () => {
    const metrics = new GatewayMetrics();
    metrics.recordAuth('ok', 1);
    metrics.recordAuth('ok', 2);
    metrics.recordAuth('invalid', 1);

    const output = await metrics.getRegistry().metrics();
    expect(output).toMatch(/mac_auth_requests_total\{outcome="ok"\} 2/);
    expect(output).toMatch(/mac_auth_requests_total\{outcome="invalid"\} 1/);
    expect(output).toMatch(/mac_auth_latency_ms_count 3/);
  });

  it('registers into a provided registry', async () => {
    const registry = new Registry();
    const metrics = new GatewayMetrics(registry);
    metrics.recordAuth('missing', 0);
    expect(metrics.getRegistry()).toBe(registry);
    expect(await registry.getSingleMetricAsString('mac_auth_requests_total')).toMatch(
      /mac_auth_requests_total\{outcome="missing"\} 1/
    );
  });
});
