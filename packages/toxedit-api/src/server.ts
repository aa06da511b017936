import { createEditCollaboratorsFromEnv } from "@toxedit/generator";
import { createApp } from "./app.js";
import { readApiConfigFromEnv, type ApiConfig } from "./config/env.js";
import { BatchCoordinator } from "./domain/batch-coordinator.js";
import { EditOrchestrator } from "./domain/edit-orchestrator.js";
import { LOG_PREFIX, consoleLogger } from "./domain/logger.js";
import { InMemoryRecordStore } from "./storage/in-memory-record-store.js";
import { SqliteRecordStore } from "./storage/sqlite-record-store.js";
import type { RecordStore } from "./types/record-store.js";

function createStore(config: ApiConfig): RecordStore {
  if (config.storeDriver === "memory") {
    consoleLogger.warn(`${LOG_PREFIX} using the in-memory record store; versions are lost on restart`);
    return new InMemoryRecordStore();
  }
  return new SqliteRecordStore(config.databasePath);
}

async function main() {
  const config = readApiConfigFromEnv();
  const store = createStore(config);
  const { generator, extractor } = createEditCollaboratorsFromEnv();
  const orchestrator = new EditOrchestrator({
    store,
    generator,
    extractor,
    generationTimeoutMs: config.generationTimeoutMs,
    logger: consoleLogger,
  });
  const batchCoordinator = new BatchCoordinator({ orchestrator, logger: consoleLogger });
  const app = createApp({ store, orchestrator, batchCoordinator, logger: consoleLogger });

  app.listen(config.port, () => {
    // eslint-disable-next-line no-console
    console.log(`${LOG_PREFIX} listening on :${config.port}`);
  });
}

void main();
