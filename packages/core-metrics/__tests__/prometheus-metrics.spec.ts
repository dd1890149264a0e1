import { describe, expect, it } from "vitest";
import { Registry } from "prom-client";
import { PrometheusMetricsService, RewardsMetric, UNSET_LABEL } from "../src";

async function samples(registry: Registry, name: string) {
  const metric = registry.getSingleMetric(name);
  if (!metric) {
    throw new Error(`${name} is not registered`);
  }
  const { values } = await metric.get();
  return values.map((sample) => ({ labels: sample.labels, value: sample.value }));
}

describe("PrometheusMetricsService", () => {
  it("registers every rewards metric up front", () => {
    const registry = new Registry();
    new PrometheusMetricsService(registry);

    for (const name of Object.values(RewardsMetric)) {
      expect(registry.getSingleMetric(name)).toBeDefined();
    }
  });

  it("counts a success and then a rejection on the same counter", async () => {
    const registry = new Registry();
    const metrics = new PrometheusMetricsService(registry);

    metrics.increment(RewardsMetric.SPINS, { status: "win" });
    metrics.increment(RewardsMetric.SPINS, { status: "rejected", reason: "SPIN_LIMIT" });
    metrics.increment(RewardsMetric.SPINS, { status: "win" });

    const spins = await samples(registry, RewardsMetric.SPINS);
    expect(spins).toHaveLength(2);
    expect(spins).toContainEqual({ labels: expect.objectContaining({ status: "win", reason: UNSET_LABEL }), value: 2 });
    expect(spins).toContainEqual({ labels: expect.objectContaining({ status: "rejected", reason: "SPIN_LIMIT" }), value: 1 });
  });

  it("drops labels a metric does not declare", async () => {
    const registry = new Registry();
    const metrics = new PrometheusMetricsService(registry);

    metrics.increment(RewardsMetric.PRIZES_EXPIRED, { batch: "nightly" });

    expect(await samples(registry, RewardsMetric.PRIZES_EXPIRED)).toEqual([{ labels: {}, value: 1 }]);
  });

  it("keeps the first label set of a metric it creates on demand", async () => {
    const registry = new Registry();
    const metrics = new PrometheusMetricsService(registry);

    metrics.increment("rewards_cache_misses_total", { cache: "campaign" });
    metrics.increment("rewards_cache_misses_total", { cache: "location", region: "eu" });

    expect(await samples(registry, "rewards_cache_misses_total")).toEqual([
      { labels: { cache: "campaign" }, value: 1 },
      { labels: { cache: "location" }, value: 1 },
    ]);
  });

  it("records spin latency in the declared histogram", async () => {
    const registry = new Registry();
    const metrics = new PrometheusMetricsService(registry);

    metrics.observe(RewardsMetric.SPIN_LATENCY_MS, 42, { status: "win" });

    const histogram = registry.getSingleMetric(RewardsMetric.SPIN_LATENCY_MS);
    const values = histogram ? (await histogram.get()).values : [];
    const named = (metricName: string) => values.find((sample) => "metricName" in sample && sample.metricName === metricName);
    expect(named("rewards_spin_latency_ms_count")?.value).toBe(1);
    expect(named("rewards_spin_latency_ms_sum")?.value).toBe(42);
  });
});
