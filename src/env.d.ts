declare namespace NodeJS {
  interface ProcessEnv {
    PORT?: string;        // HTTP port, 3000 when unset
    DATA_FILE?: string;   // JSON file holding the todos
    LOG_FORMAT?: string;  // morgan format: dev, combined, tiny...
  }
}
