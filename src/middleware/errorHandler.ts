import { Request, Response, NextFunction } from "express";
import { ValidateError } from "tsoa";
import { MarketplaceError, BidRejectedError } from "../errors/marketplace.errors";
import { logger } from "../utils/logger";

interface ErrorBody {
  error: string;
  code: string;
  reason?: string;
  details?: unknown;
}

/**
 * Maps thrown errors onto HTTP responses. Marketplace errors carry their
 * own status and code; request validation is 422; anything else is 500.
 */
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ValidateError) {
    logger.debug(`Validation failed for ${req.method} ${req.path}`, { fields: err.fields });
    const body: ErrorBody = {
      error: "Validation failed",
      code: "VALIDATION_ERROR",
      details: err.fields,
    };
    res.status(422).json(body);
    return;
  }

  if (err instanceof MarketplaceError) {
    const body: ErrorBody = { error: err.message, code: err.code };
    if (err instanceof BidRejectedError) {
      body.reason = err.reason;
    }

    const summary = `${req.method} ${req.path} -> ${err.status} ${err.code}: ${err.message}`;
    if (err.status >= 500) {
      logger.error(summary);
    } else {
      logger.debug(summary);
    }

    res.status(err.status).json(body);
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  logger.error(message, {
    stack: err instanceof Error ? err.stack : undefined,
    method: req.method,
    path: req.path,
  });

  const body: ErrorBody = { error: "Internal Server Error", code: "INTERNAL" };
  res.status(500).json(body);
};
