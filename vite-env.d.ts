interface ImportMetaEnv {
  readonly VITE_RECORDS_SERVER_URL?: string;
  readonly VITE_RECORDS_BUCKET?: string;
  readonly VITE_RECORDS_COLLECTION?: string;
  readonly VITE_RECORDS_USERNAME?: string;
  readonly VITE_RECORDS_PASSWORD?: string;
  readonly VITE_LOG_LEVEL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
