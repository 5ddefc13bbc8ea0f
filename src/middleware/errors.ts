import type { Response } from "express";
import { FetchError, StoreError, SyncError, errorMessage } from "../errors.js";

export function statusFor(error: unknown): number {
  if (error instanceof FetchError) {
    switch (error.reason) {
      case "not_found":
        return 404;
      case "malformed":
        return 422;
      case "unavailable":
        return 502;
    }
  }
  if (error instanceof SyncError) return 502;
  return 500;
}

// Known failures answer with their message; anything else is a generic 500
export function sendError(res: Response, error: unknown, context: string): void {
  const status = statusFor(error);
  const known = error instanceof FetchError || error instanceof SyncError || error instanceof StoreError;
  console.error(`[API] ${context}:`, errorMessage(error));
  res.status(status).json({
    error: known ? errorMessage(error) : "Internal server error",
    ...(known ? { reason: error.reason } : {}),
  });
}
