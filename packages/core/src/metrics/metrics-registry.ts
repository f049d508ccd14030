export type Labels = Record<string, string>;

export const DEFAULT_BUCKETS: ReadonlyArray<number> = [
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
];

interface MetricDefinition {
  name: string;
  help: string;
  labelNames: ReadonlyArray<string>;
}

function labelKey(labelNames: ReadonlyArray<string>, labels: Labels): string {
  return JSON.stringify(labelNames.map((name) => labels[name] ?? ''));
}

function escapeLabelValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/\n/g, '\\n')
    .replace(/"/g, '\\"');
}

function formatLabels(
  labelNames: ReadonlyArray<string>,
  labels: Labels,
  extra?: [string, string],
): string {
  const pairs = labelNames.map(
    (name) => `${name}="${escapeLabelValue(labels[name] ?? '')}"`,
  );
  if (extra) pairs.push(`${extra[0]}="${escapeLabelValue(extra[1])}"`);
  return pairs.length > 0 ? `{${pairs.join(',')}}` : '';
}

function formatNumber(value: number): string {
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  return String(value);
}

abstract class Metric {
  abstract readonly type: 'counter' | 'gauge' | 'histogram';

  constructor(protected readonly definition: MetricDefinition) {}

  get name(): string {
    return this.definition.name;
  }

  render(): Array<string> {
    return [
      `# HELP ${this.definition.name} ${this.definition.help}`,
      `# TYPE ${this.definition.name} ${this.type}`,
      ...this.renderSamples(),
    ];
  }

  protected abstract renderSamples(): Array<string>;
}

export class Counter extends Metric {
  readonly type = 'counter';
  private readonly values = new Map<string, { labels: Labels; value: number }>();

  inc(labels: Labels = {}, amount: number = 1): void {
    if (amount < 0) {
      throw new Error(`Counter ${this.name} cannot be decreased`);
    }
    const key = labelKey(this.definition.labelNames, labels);
    const entry = this.values.get(key);
    if (entry) {
      entry.value += amount;
    } else {
      this.values.set(key, { labels: { ...labels }, value: amount });
    }
  }

  get(labels: Labels = {}): number {
    return (
      this.values.get(labelKey(this.definition.labelNames, labels))?.value ?? 0
    );
  }

  protected renderSamples(): Array<string> {
    return Array.from(this.values.values()).map(
      ({ labels, value }) =>
        `${this.name}${formatLabels(this.definition.labelNames, labels)} ${formatNumber(value)}`,
    );
  }
}

export class Gauge extends Metric {
  readonly type = 'gauge';
  private readonly values = new Map<string, { labels: Labels; value: number }>();

  set(value: number, labels: Labels = {}): void {
    const key = labelKey(this.definition.labelNames, labels);
    this.values.set(key, { labels: { ...labels }, value });
  }

  inc(labels: Labels = {}, amount: number = 1): void {
    this.set(this.get(labels) + amount, labels);
  }

  dec(labels: Labels = {}, amount: number = 1): void {
    this.set(this.get(labels) - amount, labels);
  }

  get(labels: Labels = {}): number {
    return (
      this.values.get(labelKey(this.definition.labelNames, labels))?.value ?? 0
    );
  }

  protected renderSamples(): Array<string> {
    const samples = Array.from(this.values.values());
    if (samples.length === 0 && this.definition.labelNames.length === 0) {
      return [`${this.name} 0`];
    }
    return samples.map(
      ({ labels, value }) =>
        `${this.name}${formatLabels(this.definition.labelNames, labels)} ${formatNumber(value)}`,
    );
  }
}

interface HistogramSeries {
  labels: Labels;
  /** Non-cumulative count per bucket; cumulated on render. */
  bucketCounts: Array<number>;
  sum: number;
  count: number;
}

export class Histogram extends Metric {
  readonly type = 'histogram';
  private readonly buckets: ReadonlyArray<number>;
  private readonly series = new Map<string, HistogramSeries>();

  constructor(definition: MetricDefinition, buckets: ReadonlyArray<number>) {
    super(definition);
    this.buckets = [...buckets].sort((a, b) => a - b);
  }

  observe(value: number, labels: Labels = {}): void {
    const key = labelKey(this.definition.labelNames, labels);
    let entry = this.series.get(key);
    if (!entry) {
      entry = {
        labels: { ...labels },
        bucketCounts: this.buckets.map(() => 0),
        sum: 0,
        count: 0,
      };
      this.series.set(key, entry);
    }

    const index = this.buckets.findIndex((bound) => value <= bound);
    if (index !== -1) {
      entry.bucketCounts[index] = (entry.bucketCounts[index] ?? 0) + 1;
    }
    entry.sum += value;
    entry.count += 1;
  }

  getCount(labels: Labels = {}): number {
    return (
      this.series.get(labelKey(this.definition.labelNames, labels))?.count ?? 0
    );
  }

  getSum(labels: Labels = {}): number {
    return (
      this.series.get(labelKey(this.definition.labelNames, labels))?.sum ?? 0
    );
  }

  protected renderSamples(): Array<string> {
    const lines: Array<string> = [];
    const { labelNames } = this.definition;

    for (const entry of this.series.values()) {
      let cumulative = 0;
      this.buckets.forEach((bound, i) => {
        cumulative += entry.bucketCounts[i] ?? 0;
        lines.push(
          `${this.name}_bucket${formatLabels(labelNames, entry.labels, ['le', formatNumber(bound)])} ${cumulative}`,
        );
      });
      lines.push(
        `${this.name}_bucket${formatLabels(labelNames, entry.labels, ['le', '+Inf'])} ${entry.count}`,
      );
      lines.push(
        `${this.name}_sum${formatLabels(labelNames, entry.labels)} ${formatNumber(entry.sum)}`,
      );
      lines.push(
        `${this.name}_count${formatLabels(labelNames, entry.labels)} ${entry.count}`,
      );
    }

    return lines;
  }
}

/**
 * Process-local metric registry rendering the Prometheus text exposition
 * format. Metric names are unique per registry.
 */
export class MetricsRegistry {
  private readonly metrics = new Map<string, Metric>();

  counter(
    name: string,
    help: string,
    labelNames: ReadonlyArray<string> = [],
  ): Counter {
    return this.register(new Counter({ name, help, labelNames }));
  }

  gauge(
    name: string,
    help: string,
    labelNames: ReadonlyArray<string> = [],
  ): Gauge {
    return this.register(new Gauge({ name, help, labelNames }));
  }

  histogram(
    name: string,
    help: string,
    labelNames: ReadonlyArray<string> = [],
    buckets: ReadonlyArray<number> = DEFAULT_BUCKETS,
  ): Histogram {
    return this.register(new Histogram({ name, help, labelNames }, buckets));
  }

  render(): string {
    const lines: Array<string> = [];
    for (const metric of this.metrics.values()) {
      lines.push(...metric.render());
    }
    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }

  private register<T extends Metric>(metric: T): T {
    if (this.metrics.has(metric.name)) {
      throw new Error(`Metric already registered: ${metric.name}`);
    }
    this.metrics.set(metric.name, metric);
    return metric;
  }
}
