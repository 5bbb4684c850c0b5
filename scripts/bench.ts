import { MetricsEngine } from '../src/core/engine.js';
import { createLogger } from '../src/utils/logger.js';

function hrMs([s, ns]: [number, number]) { return s * 1000 + ns / 1e6; }

const N = 200_000;
const SERIES = 50;
const engine = new MetricsEngine({ logger: createLogger('bench', 'warn') });

const start = process.hrtime();
for (let i = 0; i < N; i++) engine.recordSample('bench_op', Math.random() * 5, { series: 's' + (i % SERIES) });
let t = hrMs(process.hrtime(start));
console.log(`RECORD ${N} samples in ${t.toFixed(2)} ms -> ${(N / (t/1000)).toFixed(0)} ops/sec`);

const start2 = process.hrtime();
for (let i = 0; i < N; i++) engine.incrementCounter('bench_total', 1, { series: 's' + (i % SERIES) });
t = hrMs(process.hrtime(start2));
console.log(`INCR ${N} counters in ${t.toFixed(2)} ms -> ${(N / (t/1000)).toFixed(0)} ops/sec`);

const start3 = process.hrtime();
const text = engine.renderPrometheusText();
const snap = engine.getSnapshot();
t = hrMs(process.hrtime(start3));
console.log(`EXPORT ${SERIES} series (${text.length} bytes text, ${Object.keys(snap.histograms).length} summaries) in ${t.toFixed(2)} ms`);
