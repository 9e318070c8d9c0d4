import { NextFunction, Request, Response } from "express";
import { DispatchError } from "../errors/DispatchError";

export interface ErrorResponseBody {
  error: string;
  code?: string;
  details?: unknown;
}

/**
 * Turns thrown errors into JSON responses.
 * DispatchErrors answer with their own status and code; anything else is a 500.
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof DispatchError) {
    if (err.statusCode >= 500) {
      console.error(`✗ ${req.method} ${req.originalUrl}:`, err);
    }

    const body: ErrorResponseBody = { error: err.message, code: err.code };
    if (err.details !== undefined) {
      body.details = err.details;
    }
    res.status(err.statusCode).json(body);
    return;
  }

  // express.json() rejects unparseable bodies with a 400 SyntaxError
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  console.error(`✗ ${req.method} ${req.originalUrl}:`, err);
  res.status(500).json({ error: "Internal server error" });
}
