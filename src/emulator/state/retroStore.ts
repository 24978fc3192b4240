import { createStore } from 'zustand/vanilla';

import type { RomInfo } from '../cores/EmulatorCore';

export type PlayerState = 'idle' | 'loading' | 'running' | 'paused' | 'error';

export interface SessionNotice {
  source: 'storage' | 'core';
  message: string;
}

export interface RetroState {
  status: PlayerState;
  error: string | null;
  /** Last non-fatal failure shown to the user (cancelled picker, bad ROM, ...). */
  notice: SessionNotice | null;
  romName: string | null;
  romInfo: (RomInfo & { sha256: string | null }) | null;
}

export interface RetroActions {
  setStatus: (status: PlayerState) => void;
  setError: (error: string) => void;
  setNotice: (notice: SessionNotice | null) => void;
  setRom: (romName: string, info: RomInfo) => void;
  setRomHash: (sha256: string) => void;
}

export type RetroStore = ReturnType<typeof createRetroStore>;

export const createRetroStore = () =>
  createStore<RetroState & RetroActions>((set) => ({
    status: 'idle',
    error: null,
    notice: null,
    romName: null,
    romInfo: null,

    setStatus: (status) => set({ status, error: null }),
    setError: (error) => set({ error, status: 'error' }),
    setNotice: (notice) => set({ notice }),
    setRom: (romName, info) => set({ romName, romInfo: { ...info, sha256: null } }),
    setRomHash: (sha256) => set((state) => (state.romInfo ? { romInfo: { ...state.romInfo, sha256 } } : {})),
  }));
