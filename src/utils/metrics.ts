
/**
 * Prometheus-style histograms for heap workloads (bench and host programs).
 * Exposition text only; nothing is served from here.
 */

export type Labels = Record<string, string>;

interface Series {
  counts: number[];
  sum: number;
  count: number;
  labels: Labels;
}

function seriesKey(labels: Labels): string {
  return Object.keys(labels).sort().map((k) => `${k}=${labels[k]}`).join('|');
}

function formatLabels(labels: Labels): string {
  const parts = Object.keys(labels).sort().map((k) => `${k}="${labels[k]}"`);
  return parts.length ? `{${parts.join(',')}}` : '';
}

export class LabeledHistogram {
  private readonly series = new Map<string, Series>();

  constructor(
    readonly name: string,
    readonly help: string,
    private readonly buckets: readonly number[],
  ) {}

  observe(value: number, labels: Labels = {}): void {
    const key = seriesKey(labels);
    let s = this.series.get(key);
    if (!s) {
      s = { counts: new Array<number>(this.buckets.length + 1).fill(0), sum: 0, count: 0, labels };
      this.series.set(key, s);
    }
    let i = 0;
    while (i < this.buckets.length && value > this.buckets[i]) i++;
    s.counts[i]++;
    s.sum += value;
    s.count++;
  }

  /** Observations recorded for one label set. */
  count(labels: Labels = {}): number {
    return this.series.get(seriesKey(labels))?.count ?? 0;
  }

  reset(): void { this.series.clear(); }

  export(): string {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    for (const { counts, sum, count, labels } of this.series.values()) {
      let cum = 0;
      this.buckets.forEach((le, i) => {
        cum += counts[i];
        lines.push(`${this.name}_bucket${formatLabels({ ...labels, le: String(le) })} ${cum}`);
      });
      cum += counts[this.buckets.length];
      lines.push(`${this.name}_bucket${formatLabels({ ...labels, le: '+Inf' })} ${cum}`);
      lines.push(`${this.name}_sum${formatLabels(labels)} ${sum}`);
      lines.push(`${this.name}_count${formatLabels(labels)} ${count}`);
    }
    return lines.join('\n') + '\n';
  }
}

export const metrics = {
  opSeconds: new LabeledHistogram(
    'fibheap_op_seconds',
    'Heap operation duration in seconds',
    [0.000001, 0.000005, 0.00001, 0.00005, 0.0001, 0.0005, 0.001, 0.005, 0.01],
  ),
  consolidationLinks: new LabeledHistogram(
    'fibheap_consolidation_links',
    'Tree links performed by one consolidation pass',
    [0, 1, 2, 4, 8, 16, 32, 64, 128, 256],
  ),
};
