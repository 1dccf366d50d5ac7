export type StoreDriver = "sqlite" | "memory";

export interface AppConfig {
  port: number;
  databasePath: string;
  storeDriver: StoreDriver;
  /** morgan format, or null when access logging is off */
  logFormat: string | null;
  enableReset: boolean;
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw === "") return 3000;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535, got "${raw}"`);
  }
  return port;
}

function parseStoreDriver(raw: string | undefined): StoreDriver {
  if (raw === undefined || raw === "" || raw === "sqlite") return "sqlite";
  if (raw === "memory") return "memory";
  throw new Error(`STORE_DRIVER must be "sqlite" or "memory", got "${raw}"`);
}

function parseFlag(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === "") return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new Error(`${name} must be true or false, got "${raw}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logFormat = env.LOG_FORMAT || "dev";
  return {
    port: parsePort(env.PORT),
    databasePath: env.DATABASE_PATH || "data/todos.db",
    storeDriver: parseStoreDriver(env.STORE_DRIVER),
    logFormat: logFormat === "off" ? null : logFormat,
    // reset wipes everything; keep it off in production unless asked for
    enableReset: parseFlag("ENABLE_ADMIN_RESET", env.ENABLE_ADMIN_RESET, env.NODE_ENV !== "production"),
  };
}
