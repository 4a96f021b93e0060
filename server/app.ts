import express, { type Request, type Response, type NextFunction } from "express";
import { createServer, type Server } from "http";
import { registerRoutes, type RouteDeps } from "./routes";
import { log, errorMessage } from "./log";

declare module "http" {
  interface IncomingMessage {
    rawBody?: Buffer;
  }
}

function statusOf(err: unknown): number {
  if (typeof err !== "object" || err === null) return 500;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return 500;
}

export async function createApp(deps: RouteDeps): Promise<{ app: express.Express; httpServer: Server }> {
  const app = express();
  const httpServer = createServer(app);

  app.use(
    express.json({
      verify: (req, _res, buf) => {
        req.rawBody = buf;
      },
    }),
  );
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown;

    const originalResJson = res.json.bind(res);
    res.json = (bodyJson?: unknown) => {
      capturedJsonResponse = bodyJson;
      return originalResJson(bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }
        if (logLine.length > 160) {
          logLine = logLine.slice(0, 159) + "…";
        }
        log(logLine);
      }
    });

    next();
  });

  await registerRoutes(httpServer, app, deps);

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    const status = statusOf(err);
    const message = status >= 500 ? "Internal Server Error" : errorMessage(err);
    if (status >= 500) log(`unhandled error: ${errorMessage(err)}`);
    res.status(status).json({ ok: false, error: message });
  });

  return { app, httpServer };
}
