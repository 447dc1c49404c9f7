import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import mongoSanitize from "express-mongo-sanitize";
import hpp from "hpp";
import { AppSettings } from "./config/env";
import { Services } from "./services/container";
import { AppError } from "./utils/errors";
import { createLogger } from "./utils/logger";

// ROUTES
import { createAdminRoutes } from "./routes/admin.routes";
import { createBillingRoutes } from "./routes/billing.routes";
import { createSmsRoutes } from "./routes/sms.routes";

const log = createLogger("Http");

type HttpErrorFields = {
  status?: unknown;
  statusCode?: unknown;
  type?: unknown;
};

const httpFields = (err: unknown): HttpErrorFields => (typeof err === "object" && err !== null ? err : {});

export const createApp = (services: Services, settings: AppSettings) => {
  // -----------------------------------------
  // EXPRESS APP
  // -----------------------------------------
  const app = express();

  // Behind a reverse proxy in production; needed for per-IP rate limits
  app.set("trust proxy", 1);

  // -----------------------------------------
  // SECURITY MIDDLEWARE
  // -----------------------------------------
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );

  const globalLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 1000,
    message: { success: false, message: "Too many requests, please try again later." },
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use(globalLimiter);

  // -----------------------------------------
  // CORS CONFIG
  // -----------------------------------------
  app.use(
    cors({
      origin: (origin, callback) => {
        // Webhooks and server-to-server calls carry no origin
        if (!origin) return callback(null, true);
        if (settings.allowedOrigins.includes(origin)) return callback(null, true);

        log.warn("CORS blocked origin", { origin });
        return callback(new Error("Not allowed by CORS"), false);
      },
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "X-API-Key", "Stripe-Signature"],
    })
  );

  // -----------------------------------------
  // STRIPE WEBHOOK (raw body, before JSON parsing)
  // -----------------------------------------
  app.use("/api/billing", createBillingRoutes(services));

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true, limit: "1mb" }));

  // Prevent NoSQL injection attacks
  app.use(
    mongoSanitize({
      replaceWith: "_",
      onSanitize: ({ req, key }) => {
        log.warn("NoSQL injection attempt blocked", { key, path: req.originalUrl });
      },
    })
  );

  // Prevent HTTP Parameter Pollution
  app.use(hpp());

  // -----------------------------------------
  // API ROUTES
  // -----------------------------------------
  app.use("/api/sms", createSmsRoutes(services));
  app.use("/api/admin", createAdminRoutes(services, settings.adminApiKey));

  // -----------------------------------------
  // HEALTH CHECK
  // -----------------------------------------
  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      success: true,
      status: "healthy",
      env: settings.nodeEnv,
    });
  });

  // -----------------------------------------
  // GLOBAL ERROR HANDLER
  // -----------------------------------------
  // Must stay last; always answers with JSON
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    log.error("Unhandled request error", err, { path: req.path, method: req.method });

    const fields = httpFields(err);

    if (fields.type === "entity.too.large") {
      return res.status(413).json({
        success: false,
        message: "Request body too large",
        code: "PAYLOAD_TOO_LARGE",
      });
    }

    if (fields.type === "entity.parse.failed") {
      return res.status(400).json({
        success: false,
        message: "Invalid JSON in request body",
        code: "INVALID_JSON",
      });
    }

    let statusCode = 500;
    if (err instanceof AppError) statusCode = err.statusCode;
    else if (typeof fields.statusCode === "number") statusCode = fields.statusCode;
    else if (typeof fields.status === "number") statusCode = fields.status;

    // Don't leak error details in production
    const message =
      settings.nodeEnv === "production"
        ? "An unexpected error occurred"
        : err instanceof Error
          ? err.message
          : "Unknown error";

    return res.status(statusCode).json({
      success: false,
      message,
      code: err instanceof AppError ? err.code : "INTERNAL_ERROR",
    });
  });

  return app;
};
