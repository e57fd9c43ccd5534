import express from "express";
import cors from "cors";
import morgan from "morgan";
import helmet from "helmet";
import compression from "compression";
import { createRoutes, RouteDeps } from "./routes";
import { HttpError, StoreUnavailableError, ValidationError } from "./utils/httpError";

export interface AppDeps extends RouteDeps {
  version: string;
  nodeEnv: string;
  corsOrigins: string[];
}

export function createApp(deps: AppDeps): express.Express {
  const isDevelopment = deps.nodeEnv === "development";

  // -----------------------------------------
  // Express App
  // -----------------------------------------
  const app = express();
  app.set("trust proxy", 1);

  // -----------------------------------------
  // Middleware Setup
  // -----------------------------------------
  app.use(helmet());
  app.use(compression());
  if (deps.nodeEnv !== "test") app.use(morgan("dev"));

  // -----------------------------------------
  // CORS
  // -----------------------------------------
  app.use(
    cors({
      origin: deps.corsOrigins.length > 0 ? deps.corsOrigins : false,
      methods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
      optionsSuccessStatus: 204,
    })
  );
  app.use(express.json());

  // -----------------------------------------
  // Routes
  // -----------------------------------------
  app.use("/api", createRoutes(deps));

  // -----------------------------------------
  // Health Check
  // -----------------------------------------
  app.get("/health", (_req, res) =>
    res.json({
      status: "ok",
      version: deps.version,
      timestamp: new Date().toISOString(),
    })
  );

  // -----------------------------------------
  // 404 Handler
  // -----------------------------------------
  app.use((req: express.Request, res: express.Response) => {
    res.status(404).json({
      error: "Not Found",
      message: `Cannot ${req.method} ${req.url}`,
    });
  });

  // -----------------------------------------
  // Error Handler
  // -----------------------------------------
  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      // express only treats four-argument middleware as an error handler
      _next: express.NextFunction
    ) => {
      if (err instanceof HttpError) {
        res.status(err.statusCode).json({
          error: err.name,
          message: err.message,
          ...(err instanceof ValidationError && { details: err.details }),
        });
        return;
      }

      const error = err instanceof Error ? err : new Error(String(err));
      console.error("[ERROR]", { message: error.message, stack: error.stack });

      if (error instanceof StoreUnavailableError) {
        res.status(503).json({ error: "Service Unavailable", message: error.message });
        return;
      }

      // body-parser rejects malformed JSON with a 400
      const status = "status" in error && typeof error.status === "number" ? error.status : 500;
      res.status(status).json({
        error: status === 500 ? "Internal Server Error" : error.name,
        message: isDevelopment || status !== 500 ? error.message : undefined,
        ...(isDevelopment && { stack: error.stack }),
      });
    }
  );

  return app;
}
