import { createStore } from 'zustand/vanilla';
import type { RunStatus } from '../types';

export type RunOutcome = Exclude<RunStatus, 'idle' | 'running'>;

export interface PipelineState {
  status: RunStatus;
  lastOutcome: RunOutcome | null;
  progress: number;
  statusMessage: string;
  lastError: string | null;
  modelsLoaded: boolean;
  isLoadingModels: boolean;

  // Actions
  start: () => void;
  finish: (outcome: RunOutcome) => void;
  setProgress: (progress: number, message: string) => void;
  setError: (message: string) => void;
  setModelsLoaded: (loaded: boolean) => void;
  setLoadingModels: (loading: boolean) => void;
}

export type PipelineStore = ReturnType<typeof createPipelineStore>;

export function createPipelineStore() {
  return createStore<PipelineState>()((set) => ({
    status: 'idle',
    lastOutcome: null,
    progress: 0,
    statusMessage: 'Ready',
    lastError: null,
    modelsLoaded: false,
    isLoadingModels: false,

    start: () => set({ status: 'running', progress: 0, lastError: null }),

    // Terminal status holds until the next start()
    finish: (outcome) => set({ status: outcome, lastOutcome: outcome }),

    setProgress: (progress, message) => set({ progress, statusMessage: message }),

    setError: (message) => set({ lastError: message }),

    setModelsLoaded: (loaded) => set({ modelsLoaded: loaded }),

    setLoadingModels: (loading) => set({ isLoadingModels: loading }),
  }));
}
