import { Counter, Histogram, Registry, exponentialBuckets } from 'prom-client';

export type MetricLabels = Record<string, string | number>;

/**
 * Where orchestration code reports counters and timings. Injected, never global.
 */
export interface MetricsSink {
  increment(name: string, labels?: MetricLabels): void;
  observe(name: string, value: number, labels?: MetricLabels): void;
}

export const MetricNames = {
  CHARGES_TOTAL: 'payment_charges_total',
  REFUNDS_TOTAL: 'payment_refunds_total',
  CLEANUP_ERRORS: 'payment_cleanup_errors',
  COMPENSATIONS_TOTAL: 'payment_compensations_total',
  MAPPING_WRITE_FAILURES: 'provider_mapping_write_failures_total',
  FANOUT_ERRORS: 'provider_fanout_errors_total',
  OPERATION_DURATION: 'payment_operation_duration_seconds',
  CIRCUIT_STATE_CHANGES: 'circuit_breaker_state_changes_total',
  ALERTS_SENT: 'alerts_sent_total',
} as const;

interface MetricDefinition {
  kind: 'counter' | 'histogram';
  help: string;
  labelNames: readonly string[];
  buckets?: number[];
}

const METRIC_DEFINITIONS: Record<string, MetricDefinition> = {
  [MetricNames.CHARGES_TOTAL]: {
    kind: 'counter',
    help: 'Charge attempts by provider and outcome',
    labelNames: ['provider', 'status'],
  },
  [MetricNames.REFUNDS_TOTAL]: {
    kind: 'counter',
    help: 'Refund attempts by provider and outcome',
    labelNames: ['provider', 'status'],
  },
  [MetricNames.CLEANUP_ERRORS]: {
    kind: 'counter',
    help: 'Compensating refunds that failed after a persistence error',
    labelNames: ['provider'],
  },
  [MetricNames.COMPENSATIONS_TOTAL]: {
    kind: 'counter',
    help: 'Compensating refunds started after a persistence error',
    labelNames: ['provider', 'outcome'],
  },
  [MetricNames.MAPPING_WRITE_FAILURES]: {
    kind: 'counter',
    help: 'Entity to provider mappings that could not be persisted',
    labelNames: ['entity_type', 'provider'],
  },
  [MetricNames.FANOUT_ERRORS]: {
    kind: 'counter',
    help: 'Providers skipped during a fan-out listing',
    labelNames: ['operation', 'provider'],
  },
  [MetricNames.OPERATION_DURATION]: {
    kind: 'histogram',
    help: 'Duration of provider operations in seconds',
    labelNames: ['operation', 'provider'],
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  },
  [MetricNames.CIRCUIT_STATE_CHANGES]: {
    kind: 'counter',
    help: 'Circuit breaker state transitions',
    labelNames: ['circuit', 'to'],
  },
  [MetricNames.ALERTS_SENT]: {
    kind: 'counter',
    help: 'Total number of alerts sent',
    labelNames: ['type', 'severity'],
  },
};

/**
 * prom-client backed sink with its own registry.
 *
 * Known metrics use the label sets above; any other name is registered on
 * first use with the label names it was first reported with.
 */
export class PrometheusMetricsSink implements MetricsSink {
  private readonly counters = new Map<string, Counter<string>>();
  private readonly histograms = new Map<string, Histogram<string>>();

  constructor(readonly registry: Registry = new Registry()) {}

  increment(name: string, labels: MetricLabels = {}): void {
    this.counter(name, labels).inc(labels);
  }

  observe(name: string, value: number, labels: MetricLabels = {}): void {
    this.histogram(name, labels).observe(labels, value);
  }

  /**
   * Exposition text for a scrape endpoint
   */
  async metrics(): Promise<string> {
    return this.registry.metrics();
  }

  private counter(name: string, labels: MetricLabels): Counter<string> {
    let counter = this.counters.get(name);
    if (!counter) {
      const definition = METRIC_DEFINITIONS[name];
      counter = new Counter({
        name,
        help: definition?.help ?? name,
        labelNames: definition ? [...definition.labelNames] : Object.keys(labels),
        registers: [this.registry],
      });
      this.counters.set(name, counter);
    }
    return counter;
  }

  private histogram(name: string, labels: MetricLabels): Histogram<string> {
    let histogram = this.histograms.get(name);
    if (!histogram) {
      const definition = METRIC_DEFINITIONS[name];
      histogram = new Histogram({
        name,
        help: definition?.help ?? name,
        labelNames: definition ? [...definition.labelNames] : Object.keys(labels),
        buckets: definition?.buckets ?? exponentialBuckets(0.05, 2, 10),
        registers: [this.registry],
      });
      this.histograms.set(name, histogram);
    }
    return histogram;
  }
}

export class NoopMetricsSink implements MetricsSink {
  increment(): void {}

  observe(): void {}
}
