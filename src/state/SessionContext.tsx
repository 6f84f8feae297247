import { createContext, useContext, useState, type ReactNode } from 'react'
import { useStore } from 'zustand'
import { createAppStore, type AppState, type AppStore } from './store'

const StoreContext = createContext<AppStore | null>(null)

export function SessionProvider({ children, store }: { children: ReactNode; store?: AppStore }) {
  const [value] = useState(() => store ?? createAppStore())
  return <StoreContext.Provider value={value}>{children}</StoreContext.Provider>
}

export function useApp<T>(selector: (s: AppState) => T): T {
  const store = useContext(StoreContext)
  if (!store) throw new Error('useApp must be used inside <SessionProvider>')
  return useStore(store, selector)
}
