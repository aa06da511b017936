import { isEvidenceField, type EditErrorCode, type EvidenceField } from "@toxedit/contracts";
import type { NextFunction, Request, Response } from "express";
import type { ZodType } from "zod";
import { EditError, describeError } from "../domain/edit-errors.js";
import { LOG_PREFIX, type EditLogger } from "../domain/logger.js";

export function parseBody<T>(
  schema: ZodType<T>,
  req: Request,
  res: Response,
): T | null {
  const result = schema.safeParse(req.body);
  if (!result.success) {
    res.status(400).json({
      error: "invalid_request",
      issues: result.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    });
    return null;
  }
  return result.data;
}

export function parseParam(
  value: string | undefined,
  field: string,
  res: Response,
): string | null {
  if (!value || value.length === 0) {
    res.status(400).json({ error: "invalid_request", message: `missing path parameter: ${field}` });
    return null;
  }
  return value;
}

export function parseVersionParam(
  value: string | undefined,
  field: string,
  res: Response,
): number | null {
  const raw = parseParam(value, field, res);
  if (raw === null) {
    return null;
  }
  if (!/^[1-9][0-9]*$/.test(raw)) {
    res.status(400).json({ error: "invalid_request", message: `${field} must be a positive integer: ${raw}` });
    return null;
  }
  return Number.parseInt(raw, 10);
}

export function parseIndexParam(
  value: string | undefined,
  field: string,
  res: Response,
): number | null {
  const raw = parseParam(value, field, res);
  if (raw === null) {
    return null;
  }
  if (!/^(0|[1-9][0-9]*)$/.test(raw)) {
    res.status(400).json({ error: "invalid_request", message: `${field} must be a non-negative integer: ${raw}` });
    return null;
  }
  return Number.parseInt(raw, 10);
}

export function parseEvidenceFieldParam(value: string | undefined, res: Response): EvidenceField | null {
  const raw = parseParam(value, "field", res);
  if (raw === null) {
    return null;
  }
  if (!isEvidenceField(raw)) {
    res.status(400).json({ error: "invalid_request", message: `not an evidence field: ${raw}` });
    return null;
  }
  return raw;
}

export function notFound(res: Response, message: string): void {
  res.status(404).json({ error: "not_found", message });
}

const EDIT_ERROR_STATUS: Record<EditErrorCode, number> = {
  PATCH_VALIDATION_FAILED: 422,
  UNKNOWN_FIELD_REFERENCE: 422,
  MALFORMED_FALLBACK_OUTPUT: 422,
  PAYLOAD_VALIDATION_FAILED: 422,
  GENERATION_TIMEOUT: 504,
  GENERATION_ERROR: 502,
  EDIT_CANCELLED: 503,
  STORE_WRITE_FAILURE: 500,
};

export function statusForEditError(code: EditErrorCode): number {
  return EDIT_ERROR_STATUS[code];
}

export function createErrorHandler(logger: EditLogger) {
  return (error: unknown, _req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof EditError) {
      res.status(statusForEditError(error.code)).json({
        error: error.code.toLowerCase(),
        path: error.path ?? null,
        message: error.message,
      });
      return;
    }

    if (error instanceof Error && "status" in error && error.status === 400) {
      res.status(400).json({ error: "invalid_request", message: error.message });
      return;
    }

    logger.error(`${LOG_PREFIX} unhandled request error: ${describeError(error)}`);
    res.status(500).json({ error: "internal_error", message: "unexpected server error" });
  };
}
