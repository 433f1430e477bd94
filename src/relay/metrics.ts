// src/relay/metrics.ts — Counters, gauges and histograms for the relay
//
// Prometheus exposition via serialize(); a plain read-only snapshot() for
// in-process monitoring collaborators.

/** Latency buckets in seconds */
const DEFAULT_BUCKETS = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60]

// ---------------------------------------------------------------------------
// Metric Types
// ---------------------------------------------------------------------------

interface ScalarMetric {
  name: string
  help: string
  labels: Map<string, number>
}

interface HistogramMetric {
  name: string
  help: string
  buckets: number[]
  observations: Map<string, HistogramObservation>
}

interface HistogramObservation {
  bucketCounts: number[] // same length as buckets, non-cumulative
  sum: number
  count: number
}

export interface HistogramSnapshot {
  buckets: Record<string, number> // cumulative, keyed by upper bound
  sum: number
  count: number
}

export interface MetricsSnapshot {
  counters: Record<string, Record<string, number>>
  gauges: Record<string, Record<string, number>>
  histograms: Record<string, Record<string, HistogramSnapshot>>
}

// ---------------------------------------------------------------------------
// MetricRegistry
// ---------------------------------------------------------------------------

export class MetricRegistry {
  private readonly counters = new Map<string, ScalarMetric>()
  private readonly gauges = new Map<string, ScalarMetric>()
  private readonly histograms = new Map<string, HistogramMetric>()

  registerCounter(name: string, help: string): void {
    if (!this.counters.has(name)) {
      this.counters.set(name, { name, help, labels: new Map() })
    }
  }

  registerGauge(name: string, help: string): void {
    if (!this.gauges.has(name)) {
      this.gauges.set(name, { name, help, labels: new Map() })
    }
  }

  registerHistogram(name: string, help: string, buckets?: number[]): void {
    if (!this.histograms.has(name)) {
      const sorted = [...(buckets ?? DEFAULT_BUCKETS)].sort((a, b) => a - b)
      this.histograms.set(name, { name, help, buckets: sorted, observations: new Map() })
    }
  }

  incrementCounter(name: string, labels: Record<string, string> = {}, value = 1): void {
    const counter = this.counters.get(name)
    if (!counter) return
    const key = this.serializeLabels(labels)
    counter.labels.set(key, (counter.labels.get(key) ?? 0) + value)
  }

  setGauge(name: string, labels: Record<string, string> = {}, value: number): void {
    const gauge = this.gauges.get(name)
    if (!gauge) return
    gauge.labels.set(this.serializeLabels(labels), value)
  }

  observeHistogram(name: string, labels: Record<string, string> = {}, value: number): void {
    const histogram = this.histograms.get(name)
    if (!histogram) return
    const key = this.serializeLabels(labels)

    let obs = histogram.observations.get(key)
    if (!obs) {
      obs = { bucketCounts: new Array<number>(histogram.buckets.length).fill(0), sum: 0, count: 0 }
      histogram.observations.set(key, obs)
    }

    obs.sum += value
    obs.count++
    const idx = histogram.buckets.findIndex((upper) => value <= upper)
    if (idx !== -1) obs.bucketCounts[idx]++
  }

  /** Current value of a counter for the exact label set (0 when never touched). */
  counterValue(name: string, labels: Record<string, string> = {}): number {
    return this.counters.get(name)?.labels.get(this.serializeLabels(labels)) ?? 0
  }

  gaugeValue(name: string, labels: Record<string, string> = {}): number | undefined {
    return this.gauges.get(name)?.labels.get(this.serializeLabels(labels))
  }

  snapshot(): MetricsSnapshot {
    const scalars = (source: Map<string, ScalarMetric>) => {
      const out: Record<string, Record<string, number>> = {}
      for (const [name, metric] of source) {
        out[name] = Object.fromEntries(metric.labels)
      }
      return out
    }

    const histograms: Record<string, Record<string, HistogramSnapshot>> = {}
    for (const [name, histogram] of this.histograms) {
      const series: Record<string, HistogramSnapshot> = {}
      for (const [labels, obs] of histogram.observations) {
        const buckets: Record<string, number> = {}
        let cumulative = 0
        histogram.buckets.forEach((upper, i) => {
          cumulative += obs.bucketCounts[i]
          buckets[String(upper)] = cumulative
        })
        buckets["+Inf"] = obs.count
        series[labels] = { buckets, sum: obs.sum, count: obs.count }
      }
      histograms[name] = series
    }

    return { counters: scalars(this.counters), gauges: scalars(this.gauges), histograms }
  }

  serialize(): string {
    const lines: string[] = []

    const scalar = (metric: ScalarMetric, type: "counter" | "gauge") => {
      lines.push(`# HELP ${metric.name} ${metric.help}`)
      lines.push(`# TYPE ${metric.name} ${type}`)
      for (const [labels, value] of metric.labels) {
        const labelStr = labels ? `{${labels}}` : ""
        lines.push(`${metric.name}${labelStr} ${value}`)
      }
    }

    for (const counter of this.counters.values()) scalar(counter, "counter")
    for (const gauge of this.gauges.values()) scalar(gauge, "gauge")

    for (const histogram of this.histograms.values()) {
      lines.push(`# HELP ${histogram.name} ${histogram.help}`)
      lines.push(`# TYPE ${histogram.name} histogram`)
      for (const [labels, obs] of histogram.observations) {
        const baseLabels = labels ? `${labels},` : ""
        const suffix = labels ? `{${labels}}` : ""
        let cumulative = 0
        for (let i = 0; i < histogram.buckets.length; i++) {
          cumulative += obs.bucketCounts[i]
          lines.push(`${histogram.name}_bucket{${baseLabels}le="${histogram.buckets[i]}"} ${cumulative}`)
        }
        lines.push(`${histogram.name}_bucket{${baseLabels}le="+Inf"} ${obs.count}`)
        lines.push(`${histogram.name}_sum${suffix} ${obs.sum}`)
        lines.push(`${histogram.name}_count${suffix} ${obs.count}`)
      }
    }

    return lines.join("\n") + "\n"
  }

  serializeLabels(labels: Record<string, string>): string {
    const entries = Object.entries(labels)
    if (entries.length === 0) return ""
    return entries
      .map(([k, v]) => {
        const escaped = v.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n")
        return `${k}="${escaped}"`
      })
      .join(",")
  }
}

// ---------------------------------------------------------------------------
// Relay metric names
// ---------------------------------------------------------------------------

export const RELAY_METRICS = {
  requests: "relay_requests_total",
  failures: "relay_failures_total",
  cacheHits: "relay_cache_hits_total",
  attempts: "relay_attempts_total",
  rateLimited: "relay_rate_limited_total",
  contentRejected: "relay_content_rejected_total",
  singleFlightJoined: "relay_singleflight_joined_total",
  circuitOpen: "relay_circuit_open",
  healthStatus: "relay_health_status",
  latency: "relay_latency_seconds",
} as const

/** Registry pre-populated with every relay metric. */
export function createRelayMetrics(): MetricRegistry {
  const registry = new MetricRegistry()
  registry.registerCounter(RELAY_METRICS.requests, "Reply requests by provider used (cache hits included)")
  registry.registerCounter(RELAY_METRICS.failures, "Failed provider attempts by provider and failure kind")
  registry.registerCounter(RELAY_METRICS.cacheHits, "Replies served from cache by originating provider")
  registry.registerCounter(RELAY_METRICS.attempts, "Provider attempts by provider and outcome")
  registry.registerCounter(RELAY_METRICS.rateLimited, "Requests denied by the rate limiter by scope")
  registry.registerCounter(RELAY_METRICS.contentRejected, "Requests rejected by the content filter by stage")
  registry.registerCounter(RELAY_METRICS.singleFlightJoined, "Requests that joined an identical in-flight request")
  registry.registerGauge(RELAY_METRICS.circuitOpen, "Circuit breaker open (1) or not (0) per provider")
  registry.registerGauge(RELAY_METRICS.healthStatus, "Provider health: 0 healthy, 1 degraded, 2 down")
  registry.registerHistogram(RELAY_METRICS.latency, "Provider call latency in seconds")
  return registry
}
