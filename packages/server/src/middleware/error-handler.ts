import type { Request, Response, NextFunction, RequestHandler } from "express";
import { ValidationError } from "../errors.js";

function statusOf(err: Error): number {
  const status = "status" in err ? err.status : undefined;
  return typeof status === "number" && status >= 400 && status < 600 ? status : 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ValidationError) {
    console.warn(`[validation] ${JSON.stringify(err.details)}`);
    res.status(422).json({
      message: err.message,
      details: err.details,
    });
    return;
  }

  if (err instanceof Error) {
    const status = statusOf(err);
    if (status >= 500) console.error(`[error] ${err.name}: ${err.message}`);
    else console.warn(`[error] ${err.name}: ${err.message}`);
    res.status(status).json({ message: err.message });
    return;
  }

  next(err);
}

/** Forward rejections of an async handler to the error handler */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}
