import { Injectable } from '@nestjs/common';
import {
  ORDER_LOOKUP_LATENCY_BUCKETS,
  ORDER_LOOKUP_METRIC_LATENCY_SECONDS,
  ORDER_LOOKUP_METRIC_REQUESTS_TOTAL,
  ORDER_LOOKUP_METRIC_UPSTREAM_CALLS_TOTAL,
} from '../../../../../common/metrics';
import type { UpstreamSystem } from '../../../domain/errors';
import type { LookupMetricsPort, LookupOutcome } from '../../../application/ports/metrics.port';

@Injectable()
export class PrometheusMetricsAdapter implements LookupMetricsPort {
  private readonly lookups = new Map<string, number>();
  private readonly upstreamCalls = new Map<string, number>();

  private readonly latencyBuckets = new Map<string, number>();
  private latencySum = 0;
  private latencyCount = 0;

  incrementLookup(outcome: LookupOutcome): void {
    this.lookups.set(outcome, (this.lookups.get(outcome) ?? 0) + 1);
  }

  incrementUpstreamCall(input: {
    system: UpstreamSystem;
    result: 'ok' | 'no_data' | 'error';
  }): void {
    const key = `${input.system}|${input.result}`;
    this.upstreamCalls.set(key, (this.upstreamCalls.get(key) ?? 0) + 1);
  }

  observeLookupLatency(seconds: number): void {
    const latency = Number.isFinite(seconds) && seconds >= 0 ? seconds : 0;

    this.latencySum += latency;
    this.latencyCount += 1;

    for (const bucket of ORDER_LOOKUP_LATENCY_BUCKETS) {
      if (latency <= bucket) {
        const key = String(bucket);
        this.latencyBuckets.set(key, (this.latencyBuckets.get(key) ?? 0) + 1);
      }
    }

    this.latencyBuckets.set('+Inf', (this.latencyBuckets.get('+Inf') ?? 0) + 1);
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    lines.push(`# HELP ${ORDER_LOOKUP_METRIC_REQUESTS_TOTAL} Total order lookups by outcome.`);
    lines.push(`# TYPE ${ORDER_LOOKUP_METRIC_REQUESTS_TOTAL} counter`);
    for (const [outcome, value] of this.lookups.entries()) {
      lines.push(`${ORDER_LOOKUP_METRIC_REQUESTS_TOTAL}{outcome="${outcome}"} ${value}`);
    }

    lines.push(
      `# HELP ${ORDER_LOOKUP_METRIC_UPSTREAM_CALLS_TOTAL} Total upstream calls by system and result.`,
    );
    lines.push(`# TYPE ${ORDER_LOOKUP_METRIC_UPSTREAM_CALLS_TOTAL} counter`);
    for (const [key, value] of this.upstreamCalls.entries()) {
      const [system, result] = key.split('|');
      lines.push(
        `${ORDER_LOOKUP_METRIC_UPSTREAM_CALLS_TOTAL}{system="${system}",result="${result}"} ${value}`,
      );
    }

    lines.push(`# HELP ${ORDER_LOOKUP_METRIC_LATENCY_SECONDS} Order lookup latency in seconds.`);
    lines.push(`# TYPE ${ORDER_LOOKUP_METRIC_LATENCY_SECONDS} histogram`);
    for (const bucket of [...ORDER_LOOKUP_LATENCY_BUCKETS.map(String), '+Inf']) {
      lines.push(
        `${ORDER_LOOKUP_METRIC_LATENCY_SECONDS}_bucket{le="${bucket}"} ${this.latencyBuckets.get(bucket) ?? 0}`,
      );
    }
    lines.push(`${ORDER_LOOKUP_METRIC_LATENCY_SECONDS}_sum ${this.latencySum}`);
    lines.push(`${ORDER_LOOKUP_METRIC_LATENCY_SECONDS}_count ${this.latencyCount}`);

    return `${lines.join('\n')}\n`;
  }
}
