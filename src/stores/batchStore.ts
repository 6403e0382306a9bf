import { createStore } from 'zustand/vanilla';
import type { BatchItemOutcome, BatchSummary } from '../types';

export interface BatchState {
  isRunning: boolean;
  total: number;
  current: number;
  statusMessage: string;
  outcomes: BatchItemOutcome[];
  succeeded: number;
  failed: number;
  cancelled: boolean;

  // Actions
  begin: (total: number) => void;
  record: (outcome: BatchItemOutcome) => void;
  markCancelled: () => void;
  end: () => void;
}

export type BatchStore = ReturnType<typeof createBatchStore>;

export function createBatchStore() {
  return createStore<BatchState>()((set) => ({
    isRunning: false,
    total: 0,
    current: 0,
    statusMessage: 'Ready',
    outcomes: [],
    succeeded: 0,
    failed: 0,
    cancelled: false,

    begin: (total) =>
      set({
        isRunning: true,
        total,
        current: 0,
        statusMessage: `Processing ${total} images...`,
        outcomes: [],
        succeeded: 0,
        failed: 0,
        cancelled: false,
      }),

    record: (outcome) =>
      set((state) => ({
        current: state.current + 1,
        statusMessage: outcome.message,
        outcomes: [...state.outcomes, outcome],
        succeeded: state.succeeded + (outcome.success ? 1 : 0),
        failed: state.failed + (outcome.success ? 0 : 1),
      })),

    markCancelled: () => set({ cancelled: true, statusMessage: 'Batch cancelled' }),

    end: () => set({ isRunning: false }),
  }));
}

export function selectSummary(state: BatchState): BatchSummary {
  return {
    outcomes: state.outcomes,
    processed: state.outcomes.length,
    succeeded: state.succeeded,
    failed: state.failed,
    cancelled: state.cancelled,
  };
}
