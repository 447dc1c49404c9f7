import { NextFunction, Request, RequestHandler, Response } from "express";

/**
 * Admin guard: the `x-api-key` header must equal the configured key.
 * An empty configured key locks the routes entirely.
 */
export const requireApiKey =
  (apiKey: string): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    const provided = req.headers["x-api-key"];
    if (!apiKey || typeof provided !== "string" || provided !== apiKey) {
      return res.status(401).json({
        success: false,
        message: "Invalid or missing API key",
      });
    }

    next();
  };
