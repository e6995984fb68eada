import { describe, it, expect } from 'vitest';
import { LabeledHistogram } from '../src/utils/metrics.js';

describe('LabeledHistogram', () => {
  it('exports cumulative buckets per label set', () => {
    const h = new LabeledHistogram('links', 'Links per pass', [1, 4]);
    h.observe(0, { op: 'pop' });
    h.observe(3, { op: 'pop' });
    h.observe(9, { op: 'pop' });
    expect(h.count({ op: 'pop' })).toBe(3);
    expect(h.count({ op: 'push' })).toBe(0);
    expect(h.export()).toBe(
      '# HELP links Links per pass\n' +
      '# TYPE links histogram\n' +
      'links_bucket{le="1",op="pop"} 1\n' +
      'links_bucket{le="4",op="pop"} 2\n' +
      'links_bucket{le="+Inf",op="pop"} 3\n' +
      'links_sum{op="pop"} 12\n' +
      'links_count{op="pop"} 3\n',
    );
  });

  it('unlabeled series and reset', () => {
    const h = new LabeledHistogram('t', 'help', [1]);
    h.observe(1);
    expect(h.export()).toBe(
      '# HELP t help\n# TYPE t histogram\nt_bucket{le="1"} 1\nt_bucket{le="+Inf"} 1\nt_sum 1\nt_count 1\n',
    );
    h.reset();
    expect(h.count()).toBe(0);
    expect(h.export()).toBe('# HELP t help\n# TYPE t histogram\n');
  });
});
