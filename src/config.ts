import "dotenv/config";

export interface AppConfig {
  port: number;
  dataFile: string;
  logFormat: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { PORT = "3000", DATA_FILE = "todo_data.json", LOG_FORMAT = "dev" } = env;

  const port = Number(PORT);
  if (!PORT.trim() || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535, got "${PORT}"`);
  }
  return { port, dataFile: DATA_FILE, logFormat: LOG_FORMAT };
}
