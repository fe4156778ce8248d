import express, { type Request, type Response, type NextFunction } from "express";
import { CONFIG } from "./config";
import { errorMessage } from "./errors";
import { createIngestionRunner } from "./pipeline";
import { registerRoutes } from "./routes";
import { storage } from "./storage";

function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  console.log(`${formattedTime} [${source}] ${message}`);
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}

const app = express();
app.use(express.json());
app.use(express.urlencoded({ extended: false }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }

      if (logLine.length > 80) {
        logLine = logLine.slice(0, 79) + "…";
      }

      log(logLine);
    }
  });

  next();
});

(async () => {
  const runner = await createIngestionRunner(storage);
  const server = await registerRoutes(app, { storage, runner });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = errorMessage(err) || "Internal Server Error";

    console.error("[API] Unhandled error:", err);
    res.status(status).json({ message });
  });

  server.listen({
    port: CONFIG.port,
    host: "0.0.0.0",
  }, () => {
    log(`serving on port ${CONFIG.port}`);
  });
})().catch((error: unknown) => {
  console.error("Server failed to start:", error);
  process.exit(1);
});
