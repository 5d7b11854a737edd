/**
 * HTTP server for the read API.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { diag, type Reporter } from "../diagnostics.js";
import { errorMessage, isProfileRepoError } from "../errors.js";
import { createApiRouter, type ApiDeps } from "./routes.js";

export interface ServerOptions extends ApiDeps {
  reporter?: Reporter;
}

export function createApp(options: ServerOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.use("/api/v1", createApiRouter(options));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: { kind: "NotFound", message: "The requested resource was not found" },
    });
  });

  // Resolution errors map to their status; anything else is a 500 without details
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isProfileRepoError(err)) {
      res.status(err.httpStatus).json({ error: err.toJSON() });
      return;
    }
    options.reporter?.report(diag("error", "API_ERROR", `${req.method} ${req.originalUrl}: ${errorMessage(err)}`));
    res.status(500).json({
      error: { kind: "Internal", message: "An unexpected error occurred" },
    });
  });

  return app;
}

export async function startServer(options: ServerOptions & { port: number; host?: string }): Promise<HttpServer> {
  const server = createServer(createApp(options));
  const host = options.host ?? "127.0.0.1";
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, host, () => {
      const address = server.address();
      const port = address !== null && typeof address === "object" ? address.port : options.port;
      options.reporter?.report(diag("info", "SERVER_LISTENING", `Read API listening on http://${host}:${port}`));
      resolve(server);
    });
  });
}
