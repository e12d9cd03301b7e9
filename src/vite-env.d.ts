/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_FIRST_WEEKDAY?: string
  readonly VITE_CALENDAR_LOCALE?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
