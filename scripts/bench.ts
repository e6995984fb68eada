
import { FibonacciHeap } from '../src/core/heap.js';
import { metrics } from '../src/utils/metrics.js';

function hrMs([s, ns]: [number, number]) { return s * 1000 + ns / 1e6; }
function hrSec([s, ns]: [number, number]) { return s + ns / 1e9; }

const N = parseInt(process.env.BENCH_N || '200000', 10);
let seed = parseInt(process.env.BENCH_SEED || '42', 10) >>> 0;

// LCG keeps runs reproducible for a given seed
function nextInt(): number {
  seed = (Math.imul(seed, 1664525) + 1013904223) >>> 0;
  return seed;
}

const heap = new FibonacciHeap<number>();

const start = process.hrtime();
for (let i = 0; i < N; i++) {
  const t0 = process.hrtime();
  heap.push(nextInt());
  metrics.opSeconds.observe(hrSec(process.hrtime(t0)), { op: 'push' });
}
let t = hrMs(process.hrtime(start));
console.log(`PUSH ${N} items in ${t.toFixed(2)} ms -> ${(N / (t / 1000)).toFixed(0)} ops/sec`);

const start2 = process.hrtime();
let prev = -1;
let ordered = true;
for (let i = 0; i < N; i++) {
  const linksBefore = heap.stats().links;
  const t0 = process.hrtime();
  const v = heap.pop() ?? -1;
  metrics.opSeconds.observe(hrSec(process.hrtime(t0)), { op: 'pop' });
  metrics.consolidationLinks.observe(heap.stats().links - linksBefore);
  if (v < prev) ordered = false;
  prev = v;
}
t = hrMs(process.hrtime(start2));
console.log(`POP ${N} items in ${t.toFixed(2)} ms -> ${(N / (t / 1000)).toFixed(0)} ops/sec (ordered=${ordered})`);

console.log(metrics.opSeconds.export() + metrics.consolidationLinks.export());
