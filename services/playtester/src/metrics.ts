import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const simulatedTicksTotal = new Counter({
  name: 'playtest_ticks_total',
  help: 'Fixed physics ticks simulated',
  registers: [registry],
});

export const animationEventsTotal = new Counter({
  name: 'playtest_animation_events_total',
  help: 'Animation markers fired, by marker',
  labelNames: ['marker'],
  registers: [registry],
});

export const fixedStepDurationSeconds = new Histogram({
  name: 'playtest_fixed_step_duration_seconds',
  help: 'Wall time of one fixed physics tick',
  buckets: [0.00005, 0.0001, 0.00025, 0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025],
  registers: [registry],
});

export function recordFixedStep(startedAt: bigint): void {
  simulatedTicksTotal.inc();
  const diffNs = Number(process.hrtime.bigint() - startedAt);
  fixedStepDurationSeconds.observe(diffNs / 1_000_000_000);
}

export function recordAnimationEvent(marker: number): void {
  animationEventsTotal.labels(String(marker)).inc();
}
