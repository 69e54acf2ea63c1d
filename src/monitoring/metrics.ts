// src/monitoring/metrics.ts
import client from 'prom-client';

// Library-owned registry; the embedding application decides how to expose it
const register = new client.Registry();

export const uowMetrics = {
  // Units of work that reached IN_PROGRESS
  begun: new client.Counter({
    name: 'datastore_uow_begun_total',
    help: 'Batches and transactions begun',
    labelNames: ['kind'] as const,
    registers: [register]
  }),

  committed: new client.Counter({
    name: 'datastore_uow_committed_total',
    help: 'Batches and transactions committed',
    labelNames: ['kind'] as const,
    registers: [register]
  }),

  rolledBack: new client.Counter({
    name: 'datastore_uow_rolled_back_total',
    help: 'Batches and transactions rolled back',
    labelNames: ['kind'] as const,
    registers: [register]
  }),

  mutationsStaged: new client.Counter({
    name: 'datastore_mutations_staged_total',
    help: 'Mutations staged on a unit of work',
    labelNames: ['op'] as const, // upsert, delete
    registers: [register]
  }),

  keysPatched: new client.Counter({
    name: 'datastore_keys_patched_total',
    help: 'Partial keys completed from a commit response',
    registers: [register]
  }),

  commitDuration: new client.Histogram({
    name: 'datastore_commit_duration_seconds',
    help: 'How long commit RPCs take',
    labelNames: ['mode'] as const,
    buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
    registers: [register]
  }),

  // Units of work currently pushed on a client stack
  activeUnitsOfWork: new client.Gauge({
    name: 'datastore_active_units_of_work',
    help: 'Batches and transactions currently on a client stack',
    registers: [register]
  })
};

export { register };
