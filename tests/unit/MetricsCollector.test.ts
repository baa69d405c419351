/**
 * MetricsCollector Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { Registry } from 'prom-client';
import { MetricsCollector } from '../../src/observability/MetricsCollector';

describe('MetricsCollector', () => {
  it('should count requests by method and status', async () => {
    const metrics = new MetricsCollector();

    metrics.incrementCounter('http_requests_total', { method: 'GET', status: 200 });
    metrics.incrementCounter('http_requests_total', { method: 'GET', status: 200 });

    const output = await metrics.getMetrics();
    expect(output).toContain('http_requests_total{method="GET",status="200"} 2');
  });

  it('should record latency in seconds', async () => {
    const metrics = new MetricsCollector();

    metrics.recordLatency('http_request_duration', 250, { method: 'POST', status: 201 });

    const output = await metrics.getMetrics();
    expect(output).toContain('http_request_duration_seconds_sum{method="POST",status="201"} 0.25');
    expect(output).toContain('http_request_duration_seconds_count{method="POST",status="201"} 1');
  });

  it('should count errors by kind', async () => {
    const metrics = new MetricsCollector();

    metrics.incrementCounter('http_errors', { method: 'DELETE', kind: 'status' });

    const output = await metrics.getMetrics();
    expect(output).toContain('http_errors_total{method="DELETE",kind="status"} 1');
  });

  it('should register nothing when disabled', async () => {
    const metrics = new MetricsCollector({ enabled: false });

    metrics.incrementCounter('http_requests_total', { method: 'GET', status: 200 });

    expect((await metrics.getMetrics()).trim()).toBe('');
  });

  it('should ignore unknown metric names', () => {
    const metrics = new MetricsCollector();

    expect(() => metrics.incrementCounter('unknown', {})).not.toThrow();
    expect(() => metrics.recordLatency('unknown', 10, {})).not.toThrow();
  });

  it('should register into a supplied registry', async () => {
    const registry = new Registry();
    const metrics = new MetricsCollector({ registry });

    metrics.incrementCounter('http_requests_total', { method: 'PUT', status: 204 });

    expect(await registry.metrics()).toContain('http_requests_total{method="PUT",status="204"} 1');
    expect(metrics.contentType).toBe(registry.contentType);
  });
});
