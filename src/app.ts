import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import swaggerUi from "swagger-ui-express";
import fs from "fs";
import path from "path";
import { errorHandler } from "./middleware/errorHandler";
import { logger } from "./utils/logger";

type RegisterRoutes = (app: express.Router) => void;

/**
 * tsoa writes these at build time (npm run tsoa:generate)
 */
function loadGeneratedRoutes(): RegisterRoutes | null {
  try {
    const generated: { RegisterRoutes?: RegisterRoutes } = require("./generated/routes");
    return generated.RegisterRoutes ?? null;
  } catch (error) {
    logger.warn("Generated routes not found. Run: npm run tsoa:generate", {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

function loadSwaggerDocument(): Record<string, unknown> | null {
  const file = path.resolve(__dirname, "..", "public", "swagger.json");
  if (!fs.existsSync(file)) {
    return null;
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  return typeof parsed === "object" && parsed !== null ? { ...parsed } : null;
}

export interface AppOptions {
  registerRoutes?: RegisterRoutes | null;
}

export function createApp(options: AppOptions = {}): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check route
  app.get("/health", (_req, res) => {
    res.json({ status: "OK", timestamp: new Date().toISOString() });
  });

  const swaggerDocument = loadSwaggerDocument();
  if (swaggerDocument) {
    app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
  } else {
    logger.warn("Swagger documentation not found. Run: npm run tsoa:generate");
  }

  const registerRoutes =
    options.registerRoutes === undefined ? loadGeneratedRoutes() : options.registerRoutes;
  if (registerRoutes) {
    registerRoutes(app);
  }

  // Error handling middleware
  app.use(errorHandler);

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found", code: "NOT_FOUND" });
  });

  return app;
}
