import type { Express, Response } from "express";
import {
  BatchEditRequestSchema,
  BatchEditResponseSchema,
  DiffResponseSchema,
  EVIDENCE_FIELDS,
  EditRequestSchema,
  EditResponseSchema,
  EvidenceEntryRequestSchema,
  EvidenceListResponseSchema,
  ExtractionRequestSchema,
  ExtractionResponseSchema,
  FieldListResponseSchema,
  HealthResponseSchema,
  IDENTITY_FIELDS,
  METRIC_FIELDS,
  METRIC_FIELD_SPECS,
  HistoryResponseSchema,
  VersionListResponseSchema,
  VersionResponseSchema,
  type HealthResponse,
} from "@toxedit/contracts";
import express from "express";
import type { BatchCoordinator } from "./domain/batch-coordinator.js";
import type { EditOrchestrator } from "./domain/edit-orchestrator.js";
import { consoleLogger, type EditLogger } from "./domain/logger.js";
import type { RecordStore } from "./types/record-store.js";
import {
  createErrorHandler,
  notFound,
  parseBody,
  parseEvidenceFieldParam,
  parseIndexParam,
  parseParam,
  parseVersionParam,
} from "./routes/http-utils.js";

type CreateAppParams = {
  store: RecordStore;
  orchestrator: EditOrchestrator;
  batchCoordinator: BatchCoordinator;
  logger?: EditLogger;
};

/** Aborts when the client goes away before the response is written. */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

export function createApp(params: CreateAppParams): Express {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_req, res) => {
    const payload: HealthResponse = {
      ok: true,
      service: "toxedit-api",
      now: new Date().toISOString(),
    };
    HealthResponseSchema.parse(payload);
    res.json(payload);
  });

  app.post("/v1/edits", async (req, res) => {
    const body = parseBody(EditRequestSchema, req, res);
    if (!body) {
      return;
    }

    const result = await params.orchestrator.edit({ ...body, signal: abortOnDisconnect(res) });
    res.json(EditResponseSchema.parse(result));
  });

  app.post("/v1/edits/batch", async (req, res) => {
    const body = parseBody(BatchEditRequestSchema, req, res);
    if (!body) {
      return;
    }

    const response = await params.batchCoordinator.run(body, { signal: abortOnDisconnect(res) });
    res.json(BatchEditResponseSchema.parse(response));
  });

  app.post("/v1/extractions", async (req, res) => {
    const body = parseBody(ExtractionRequestSchema, req, res);
    if (!body) {
      return;
    }

    const payloads = await params.orchestrator.previewExtraction(body.text, { signal: abortOnDisconnect(res) });
    const fields = METRIC_FIELDS.filter((field) => payloads[field] !== undefined);
    res.json(ExtractionResponseSchema.parse({ fields, payloads }));
  });

  app.get("/v1/fields", (_req, res) => {
    res.json(
      FieldListResponseSchema.parse({
        evidence: EVIDENCE_FIELDS,
        metrics: METRIC_FIELDS.map((field) => ({
          field,
          defaultUnit: METRIC_FIELD_SPECS[field].defaultUnit,
          evidenceField: METRIC_FIELD_SPECS[field].evidenceField,
        })),
        identity: IDENTITY_FIELDS,
      }),
    );
  });

  app.post("/v1/evidence/:field", async (req, res) => {
    const field = parseEvidenceFieldParam(req.params.field, res);
    if (!field) {
      return;
    }
    const body = parseBody(EvidenceEntryRequestSchema, req, res);
    if (!body) {
      return;
    }

    const { ingredientId, threadId, ...entry } = body;
    const result = await params.orchestrator.addEvidenceEntry({
      ingredientId,
      threadId,
      field,
      entry,
      signal: abortOnDisconnect(res),
    });
    res.json(EditResponseSchema.parse(result));
  });

  app.get("/v1/threads/:threadId/evidence/:field", (req, res) => {
    const threadId = parseParam(req.params.threadId, "threadId", res);
    if (!threadId) {
      return;
    }
    const field = parseEvidenceFieldParam(req.params.field, res);
    if (!field) {
      return;
    }

    const current = params.store.current(threadId);
    if (!current) {
      notFound(res, `thread not found: ${threadId}`);
      return;
    }

    const entries = current.record[field] ?? [];
    res.json(
      EvidenceListResponseSchema.parse({
        threadId,
        version: current.version,
        field,
        inci: current.record.inci,
        entries,
        count: entries.length,
      }),
    );
  });

  app.delete("/v1/threads/:threadId/evidence/:field/:index", async (req, res) => {
    const threadId = parseParam(req.params.threadId, "threadId", res);
    if (!threadId) {
      return;
    }
    const field = parseEvidenceFieldParam(req.params.field, res);
    if (!field) {
      return;
    }
    const index = parseIndexParam(req.params.index, "index", res);
    if (index === null) {
      return;
    }

    const result = await params.orchestrator.removeEvidenceEntry({
      threadId,
      field,
      index,
      signal: abortOnDisconnect(res),
    });
    if (!result) {
      notFound(res, `thread not found: ${threadId}`);
      return;
    }
    res.json(EditResponseSchema.parse(result));
  });

  app.get("/v1/threads/:threadId/current", (req, res) => {
    const threadId = parseParam(req.params.threadId, "threadId", res);
    if (!threadId) {
      return;
    }

    const version = params.store.current(threadId);
    if (!version) {
      notFound(res, `thread not found: ${threadId}`);
      return;
    }

    res.json(VersionResponseSchema.parse({ version }));
  });

  app.get("/v1/threads/:threadId/history", (req, res) => {
    const threadId = parseParam(req.params.threadId, "threadId", res);
    if (!threadId) {
      return;
    }

    const versions = params.store.history(threadId);
    if (!versions) {
      notFound(res, `thread not found: ${threadId}`);
      return;
    }

    res.json(HistoryResponseSchema.parse({ threadId, versions }));
  });

  app.get("/v1/threads/:threadId/versions/:version", (req, res) => {
    const threadId = parseParam(req.params.threadId, "threadId", res);
    if (!threadId) {
      return;
    }
    const versionNumber = parseVersionParam(req.params.version, "version", res);
    if (versionNumber === null) {
      return;
    }

    const version = params.store.getVersion(threadId, versionNumber);
    if (!version) {
      notFound(res, `version ${versionNumber} not found for thread ${threadId}`);
      return;
    }

    res.json(VersionResponseSchema.parse({ version }));
  });

  app.get("/v1/threads/:threadId/diff/:fromVersion/:toVersion", (req, res) => {
    const threadId = parseParam(req.params.threadId, "threadId", res);
    if (!threadId) {
      return;
    }
    const fromVersion = parseVersionParam(req.params.fromVersion, "fromVersion", res);
    if (fromVersion === null) {
      return;
    }
    const toVersion = parseVersionParam(req.params.toVersion, "toVersion", res);
    if (toVersion === null) {
      return;
    }

    const changes = params.store.diff(threadId, fromVersion, toVersion);
    if (!changes) {
      notFound(res, `versions ${fromVersion} and ${toVersion} not both found for thread ${threadId}`);
      return;
    }

    res.json(DiffResponseSchema.parse({ threadId, fromVersion, toVersion, changes }));
  });

  app.get("/v1/ingredients/:inciName/versions", (req, res) => {
    const inciName = parseParam(req.params.inciName, "inciName", res);
    if (!inciName) {
      return;
    }

    const versions = params.store.byIngredient(inciName);
    if (versions.length === 0) {
      notFound(res, `no versions found for ingredient: ${inciName}`);
      return;
    }

    res.json(VersionListResponseSchema.parse({ versions }));
  });

  app.get("/v1/batches/:batchId", (req, res) => {
    const batchId = parseParam(req.params.batchId, "batchId", res);
    if (!batchId) {
      return;
    }

    const versions = params.store.byBatch(batchId);
    if (versions.length === 0) {
      notFound(res, `batch not found: ${batchId}`);
      return;
    }

    res.json(VersionListResponseSchema.parse({ versions }));
  });

  app.use(createErrorHandler(params.logger ?? consoleLogger));

  return app;
}
