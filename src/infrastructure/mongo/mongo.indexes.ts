/**
 * Index plan for the harvest run ledger:
 * - unique: { runId: 1 }
 * - history lookups per kind: { "target.kind": 1, finishedAt: -1 }
 */
export const mongoIndexes = {
  harvestRunCollection: [
    { keys: { runId: 1 }, options: { unique: true } },
    { keys: { "target.kind": 1, finishedAt: -1 }, options: {} }
  ]
} as const;
