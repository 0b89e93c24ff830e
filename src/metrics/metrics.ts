import { Registry, collectDefaultMetrics, Counter, Histogram } from 'prom-client';

// Create a new Registry for the Prometheus metrics
const register = new Registry();

let defaultMetricsStarted = false;

// Process metrics (CPU, memory, event loop) are opt-in so short-lived test runs stay quiet
export const startDefaultMetrics = (): void => {
  if (defaultMetricsStarted) {
    return;
  }
  collectDefaultMetrics({ register });
  defaultMetricsStarted = true;
};

export const requestCounter = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

export const responseTimeHistogram = new Histogram({
  name: 'http_response_time_seconds',
  help: 'HTTP response time in seconds',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.1, 0.5, 1, 5],
  registers: [register],
});

export const botEventCounter = new Counter({
  name: 'bot_events_total',
  help: 'Chat events received, by kind',
  labelNames: ['kind'],
  registers: [register],
});

export const wizardSaveCounter = new Counter({
  name: 'wizard_saves_total',
  help: 'Confirmed wizard saves',
  labelNames: ['dialogue'],
  registers: [register],
});

export const wizardFailureCounter = new Counter({
  name: 'wizard_failures_total',
  help: 'Wizard steps or saves that failed on a collaborator',
  labelNames: ['dialogue', 'reason'],
  registers: [register],
});

export const shiftCloseCounter = new Counter({
  name: 'shift_closes_total',
  help: 'Shift close commits, by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

export default register;
