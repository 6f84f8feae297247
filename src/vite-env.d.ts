/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_APP_TITLE?: string
  readonly VITE_DEFAULT_PLOT_COUNT?: string
  readonly VITE_LOG_LIMIT?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
