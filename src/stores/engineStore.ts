import { createStore } from 'zustand/vanilla';
import type { Device, LoadedState, ModelHandle } from '../types';

export interface EngineState {
  // Model handle
  loadedState: LoadedState;
  device: Device;
  modelRef: string | null;
  modelPath: string | null;

  // Last notification
  progress: number;
  statusMessage: string;
  lastError: string | null;

  // Actions
  beginLoad: (modelPath: string, device: Device) => void;
  completeLoad: (modelRef: string, device: Device) => void;
  failLoad: (message: string) => void;
  unload: () => void;
  setProgress: (progress: number, message: string) => void;
  setError: (message: string) => void;
}

export type EngineStore = ReturnType<typeof createEngineStore>;

export function createEngineStore() {
  return createStore<EngineState>()((set) => ({
    loadedState: 'unloaded',
    device: 'cpu',
    modelRef: null,
    modelPath: null,
    progress: 0,
    statusMessage: 'Ready',
    lastError: null,

    beginLoad: (modelPath, device) =>
      set({ loadedState: 'loading', modelPath, device, modelRef: null, lastError: null }),

    completeLoad: (modelRef, device) => set({ loadedState: 'loaded', modelRef, device }),

    // The handle never survives a failed load
    failLoad: (message) =>
      set({ loadedState: 'failed', modelRef: null, modelPath: null, lastError: message }),

    unload: () => set({ loadedState: 'unloaded', modelRef: null, modelPath: null }),

    setProgress: (progress, message) => set({ progress, statusMessage: message }),

    setError: (message) => set({ lastError: message }),
  }));
}

export function selectHandle(state: EngineState): ModelHandle {
  return {
    device: state.device,
    loadedState: state.loadedState,
    modelRef: state.modelRef,
  };
}
