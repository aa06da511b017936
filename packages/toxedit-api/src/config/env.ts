export type RecordStoreDriver = "sqlite" | "memory";

export type ApiConfig = {
  port: number;
  generationTimeoutMs: number;
  storeDriver: RecordStoreDriver;
  databasePath: string;
};

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: string): number {
  const raw = env[name] ?? fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0 || String(value) !== raw.trim()) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return value;
}

function readStoreDriver(env: NodeJS.ProcessEnv): RecordStoreDriver {
  const raw = (env.TOXEDIT_STORE ?? "sqlite").trim().toLowerCase();
  if (raw !== "sqlite" && raw !== "memory") {
    throw new Error(`invalid TOXEDIT_STORE: ${raw}`);
  }
  return raw;
}

export function readApiConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return {
    port: readPositiveInt(env, "TOXEDIT_API_PORT", "8790"),
    generationTimeoutMs: readPositiveInt(env, "TOXEDIT_GENERATION_TIMEOUT_MS", "25000"),
    storeDriver: readStoreDriver(env),
    databasePath: env.TOXEDIT_DB_PATH?.trim() || "toxedit.sqlite",
  };
}
