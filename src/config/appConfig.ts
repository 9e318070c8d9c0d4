import * as dotenv from "dotenv";

dotenv.config();

export interface AppConfig {
  port: number;
  nodeEnv: string;
  maxEventLog: number; // Event log entries kept per plan
  docsEnabled: boolean;
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseInteger(env.PORT, 3000),
    nodeEnv: env.NODE_ENV || "development",
    maxEventLog: parseInteger(env.MAX_EVENT_LOG, 500),
    docsEnabled: env.DOCS_ENABLED !== "false",
  };
}

export const appConfig = loadConfig();
