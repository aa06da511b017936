export * from "./app.js";
export * from "./config/env.js";
export * from "./domain/batch-coordinator.js";
export * from "./domain/edit-errors.js";
export * from "./domain/edit-orchestrator.js";
export * from "./domain/evidence-entries.js";
export * from "./domain/form-apply.js";
export * from "./domain/intent-classifier.js";
export * from "./domain/logger.js";
export * from "./domain/merge-engine.js";
export * from "./domain/patch-protocol.js";
export * from "./domain/record-diff.js";
export * from "./domain/record-fields.js";
export * from "./storage/in-memory-record-store.js";
export * from "./storage/sqlite-record-store.js";
export * from "./storage/thread-lock.js";
export * from "./types/record-store.js";
