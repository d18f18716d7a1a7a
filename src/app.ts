import { tmpdir } from "os";
import cors from "cors";
import express from "express";
import helmet from "helmet";
import morgan from "morgan";
import { env } from "./config/env";
import { describeError, logError, logInfo } from "./logging";
import { createActionCodeRoutes } from "./routes/actionCodeRoutes";
import { DocumentStoreFactory } from "./storage/DocumentStore";

export interface AppOptions {
  createStore: DocumentStoreFactory;
  storeName: string;
  tempRoot?: string;
  maxUploadMb?: number;
  cancelCheckoutOnFailure?: boolean;
  transactionNumber?: string;
  traceRequests?: boolean;
}

export function redactQuery(query: Record<string, unknown>): Record<string, unknown> {
  const sensitiveKeys = new Set(["password", "token", "authorization", "signature"]);

  return Object.fromEntries(
    Object.entries(query).map(([key, value]) => {
      if (sensitiveKeys.has(key.toLowerCase())) {
        return [key, "[REDACTED]"];
      }

      return [key, value];
    })
  );
}

export function createApp(options: AppOptions): express.Express {
  const app = express();
  const maxUploadMb = options.maxUploadMb ?? env.MAX_UPLOAD_MB;
  const traceRequests = options.traceRequests ?? env.TRACE_REQUESTS;

  app.use(helmet());
  app.use(cors());
  if (env.NODE_ENV !== "test") {
    app.use(morgan("dev"));
  }
  app.use(express.json({ limit: `${maxUploadMb}mb` }));

  app.use((req, _res, next) => {
    if (!traceRequests) {
      return next();
    }

    logInfo("[GIT-DOC-TRACE]", {
      method: req.method,
      path: req.path,
      query: redactQuery(req.query),
      contentType: req.header("content-type") || undefined,
      contentLength: req.header("content-length") || undefined,
      userAgent: req.header("user-agent") || undefined,
      hasAuthorization: Boolean(req.header("authorization")),
      forwardedFor: req.header("x-forwarded-for") || undefined
    });

    return next();
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", store: options.storeName });
  });

  app.use(
    createActionCodeRoutes({
      createStore: options.createStore,
      tempRoot: options.tempRoot ?? env.UPLOAD_TEMP_DIR ?? tmpdir(),
      maxFileBytes: maxUploadMb * 1024 * 1024,
      cancelCheckoutOnFailure: options.cancelCheckoutOnFailure ?? env.CANCEL_CHECKOUT_ON_FAILURE,
      transactionNumber: options.transactionNumber ?? env.ACTION_CODE_TRANSACTION
    })
  );

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const message = err instanceof Error ? err.message : String(err);
    const statusCode = (() => {
      if (typeof err === "object" && err !== null) {
        if ("statusCode" in err && typeof err.statusCode === "number") {
          return err.statusCode;
        }
        if ("status" in err && typeof err.status === "number") {
          return err.status;
        }
      }
      return 0;
    })();

    if (statusCode >= 400 && statusCode < 500) {
      logInfo(`[request-error:${statusCode}]`, message || "bad request");
      return res.status(statusCode).json({ error: message || "bad request" });
    }

    logError("[request-error:500]", describeError(err));

    return res.status(500).json({ error: "internal server error" });
  });

  return app;
}
