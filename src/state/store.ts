import { createStore } from 'zustand/vanilla'
import type { PlotSpecField, Upload } from '@/types'
import { generate, setCount, startSession, updateSpec, type Session } from './session'

export interface AppState {
  // null until the first upload batch
  session: Session | null

  // actions
  upload: (files: Upload[]) => void
  clear: () => void
  setCount: (n: number) => void
  updateSpec: (slot: number, field: PlotSpecField, value: string) => void
  generate: () => void
}


export function createAppStore(initial: Session | null = null) {
  return createStore<AppState>()((set) => {
    const apply = (fn: (s: Session) => Session) =>
      set((state) => (state.session ? { session: fn(state.session) } : {}))

    return {
      session: initial,

      upload: (files) => set({ session: startSession(files) }),
      clear: () => set({ session: null }),

      setCount: (n) => apply((s) => setCount(s, n)),
      updateSpec: (slot, field, value) => apply((s) => updateSpec(s, slot, field, value)),
      generate: () => apply(generate),
    }
  })
}

export type AppStore = ReturnType<typeof createAppStore>
