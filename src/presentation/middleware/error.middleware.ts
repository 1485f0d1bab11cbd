import { NextFunction, Request, Response } from "express";

// Last-resort handler: body parser failures and anything a route let through
export function errorMiddleware(err: unknown, req: Request, res: Response, next: NextFunction): void {
  console.error("Error:", err);
  if (res.headersSent) {
    next(err);
    return;
  }

  const status =
    typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
      ? err.status
      : 500;
  const message = err instanceof Error && status < 500 ? err.message : "Internal server error";
  res.status(status).json({ error: message });
}
