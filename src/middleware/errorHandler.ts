// src/middleware/errorHandler.ts
import type { ErrorRequestHandler } from "express";
import { HttpError } from "../utils/httpError";

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  console.error(`[http] error in ${req.method} ${req.originalUrl}:`, err);
  res.status(500).json({ error: "Internal Server Error" });
};
