import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";

import { isEscrowError, type EscrowErrorCode } from "../errors.js";
import type { Logger } from "../lib/logger.js";

const STATUS_BY_CODE: Record<EscrowErrorCode, number> = {
  NOT_FOUND: 404,
  UNAUTHORIZED: 403,
  INVALID_AMOUNT: 400,
  INVALID_DURATION: 400,
  INVALID_DESCRIPTION: 400,
  AMOUNT_MISMATCH: 400,
  UNEXPECTED_NATIVE_VALUE: 400,
  INVALID_RECIPIENT: 400,
  INVALID_ADDRESS: 400,
  ALREADY_COMPLETED: 409,
  ALREADY_REFUNDED: 409,
  DEADLINE_EXPIRED: 409,
  DEADLINE_NOT_YET_PASSED: 409,
  SETTLEMENT_PENDING: 409,
  TRANSFER_FAILED: 502,
};

export function httpStatusFor(code: EscrowErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error, req, res, _next) => {
    if (error instanceof ZodError) {
      res.status(400).json({ error: "VALIDATION_FAILED", issues: error.issues });
      return;
    }
    if (error instanceof SyntaxError && "body" in error) {
      res.status(400).json({ error: "MALFORMED_JSON" });
      return;
    }
    if (isEscrowError(error)) {
      res.status(httpStatusFor(error.code)).json({ error: error.code, message: error.message });
      return;
    }
    logger.error("Request failed", {
      method: req.method,
      path: req.path,
      error: error instanceof Error ? error.message : String(error),
    });
    res.status(500).json({ error: "INTERNAL_ERROR" });
  };
}
