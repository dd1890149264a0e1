import { Global, Module } from "@nestjs/common";
import { Counter, Histogram, Registry, register } from "prom-client";

export interface IMetrics {
  increment(name: string, labels?: Record<string, string>): void;
  observe(name: string, value: number, labels?: Record<string, string>): void;
}

export const METRICS = Symbol("METRICS");

export const RewardsMetric = {
  CHECK_INS: "rewards_check_ins_total",
  SPINS: "rewards_spins_total",
  SPIN_LATENCY_MS: "rewards_spin_latency_ms",
  REDEMPTIONS: "rewards_redemptions_total",
  PRIZES_EXPIRED: "rewards_prizes_expired_total",
  LEDGER_CONFLICTS: "rewards_ledger_conflicts_total",
} as const;

export type RewardsMetricName = (typeof RewardsMetric)[keyof typeof RewardsMetric];

/** Value recorded for a declared label the caller left out. */
export const UNSET_LABEL = "none";

interface MetricDefinition {
  type: "counter" | "histogram";
  help: string;
  labelNames: readonly string[];
}

export const REWARDS_METRIC_DEFINITIONS: Record<RewardsMetricName, MetricDefinition> = {
  [RewardsMetric.CHECK_INS]: { type: "counter", help: "Check-in attempts by outcome", labelNames: ["status", "reason"] },
  [RewardsMetric.SPINS]: { type: "counter", help: "Spin attempts by outcome", labelNames: ["status", "reason"] },
  [RewardsMetric.SPIN_LATENCY_MS]: { type: "histogram", help: "Spin latency in milliseconds", labelNames: [] },
  [RewardsMetric.REDEMPTIONS]: { type: "counter", help: "Redemption completions by outcome", labelNames: ["status", "reason"] },
  [RewardsMetric.PRIZES_EXPIRED]: { type: "counter", help: "Issued prizes archived as expired", labelNames: [] },
  [RewardsMetric.LEDGER_CONFLICTS]: { type: "counter", help: "Retried transaction conflicts", labelNames: ["operation"] },
};

const LATENCY_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2000];

/**
 * prom-client fixes a metric's label set when it is created, so every known
 * metric is registered up front and each sample is reshaped to that set.
 */
export class PrometheusMetricsService implements IMetrics {
  private counters = new Map<string, { metric: Counter<string>; labelNames: readonly string[] }>();
  private histograms = new Map<string, { metric: Histogram<string>; labelNames: readonly string[] }>();

  constructor(private readonly registry: Registry = register) {
    registry.setDefaultLabels({ service: "spin-rewards" });
    for (const [name, definition] of Object.entries(REWARDS_METRIC_DEFINITIONS)) {
      if (definition.type === "counter") {
        this.createCounter(name, definition.help, definition.labelNames);
      } else {
        this.createHistogram(name, definition.help, definition.labelNames);
      }
    }
  }

  increment(name: string, labels: Record<string, string> = {}): void {
    const counter = this.counters.get(name) ?? this.createCounter(name, `${name}_counter`, Object.keys(labels));
    counter.metric.inc(shapeLabels(counter.labelNames, labels), 1);
  }

  observe(name: string, value: number, labels: Record<string, string> = {}): void {
    const histogram = this.histograms.get(name) ?? this.createHistogram(name, `${name}_histogram`, Object.keys(labels));
    histogram.metric.observe(shapeLabels(histogram.labelNames, labels), value);
  }

  private createCounter(name: string, help: string, labelNames: readonly string[]) {
    const entry = {
      metric: new Counter({ name, help, labelNames: [...labelNames], registers: [this.registry] }),
      labelNames,
    };
    this.counters.set(name, entry);
    return entry;
  }

  private createHistogram(name: string, help: string, labelNames: readonly string[]) {
    const entry = {
      metric: new Histogram({ name, help, labelNames: [...labelNames], buckets: LATENCY_BUCKETS, registers: [this.registry] }),
      labelNames,
    };
    this.histograms.set(name, entry);
    return entry;
  }
}

function shapeLabels(labelNames: readonly string[], labels: Record<string, string>): Record<string, string> {
  const shaped: Record<string, string> = {};
  for (const labelName of labelNames) {
    shaped[labelName] = labels[labelName] ?? UNSET_LABEL;
  }
  return shaped;
}

export class NoopMetricsService implements IMetrics {
  increment(): void {}
  observe(): void {}
}

export function renderMetrics(): Promise<string> {
  return register.metrics();
}

@Global()
@Module({
  providers: [
    {
      provide: METRICS,
      useFactory: () => {
        if (process.env.METRICS_DISABLED === "true") {
          return new NoopMetricsService();
        }
        return new PrometheusMetricsService();
      },
    },
  ],
  exports: [METRICS],
})
export class MetricsModule {}
