/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_LOG_LEVEL?: string;
  readonly VITE_FACILITY_CONFIG?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
