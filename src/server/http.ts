import cors from "cors";
import express, { NextFunction, Request, RequestHandler, Response } from "express";
import { CatalogService } from "../catalog/service";
import { CatalogError, ValidationError, parseGame, parseListQuery } from "../catalog/types";
import { DiagnosticsEnv, runDiagnostics } from "./diagnostics";
import { DocumentStore } from "./store";

export interface HttpAppDeps {
  catalog: CatalogService;
  store: DocumentStore;
  env: DiagnosticsEnv;
}

/** Lets async handlers reject into the error middleware instead of leaving the request hanging. */
function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

/** Maps failures to `{ detail }` bodies. Validation is the client's fault; everything else is ours. */
/** Client-error status set by middleware such as the body parser (413, 415, ...), if any. */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null) return null;
  const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError) {
    res.status(400).json({ detail: "Invalid JSON payload" });
    return;
  }
  if (err instanceof ValidationError) {
    res.status(422).json({ detail: err.message });
    return;
  }
  const status = clientErrorStatus(err);
  if (status !== null) {
    res.status(status).json({ detail: err instanceof Error ? err.message : "Bad request" });
    return;
  }
  if (err instanceof CatalogError) {
    console.error(`${err.code}: ${err.message}`);
    res.status(500).json({ detail: err.message });
    return;
  }
  console.error("Unhandled request error", err);
  res.status(500).json({ detail: err instanceof Error ? err.message : "Internal error" });
}

/**
 * Express app for the games catalog.
 * Liveness routes need nothing; `/test` reports store health; `/api/games*` go through the catalog service.
 */
export function createHttpApp({ catalog, store, env }: HttpAppDeps) {
  const app = express();
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json());

  app.get("/", (_req, res) => {
    res.json({ message: "Games Download API is running" });
  });

  app.get("/api/hello", (_req, res) => {
    res.json({ message: "Hello from the backend API!" });
  });

  app.get(
    "/test",
    route(async (_req, res) => {
      res.json(await runDiagnostics(store, env));
    })
  );

  app.post(
    "/api/games",
    route(async (req, res) => {
      const game = parseGame(req.body);
      const id = await catalog.createGame(game);
      res.json({ id });
    })
  );

  app.get(
    "/api/games/sample",
    route(async (_req, res) => {
      res.json(await catalog.seedSampleGames());
    })
  );

  app.get(
    "/api/games",
    route(async (req, res) => {
      const { q, limit } = parseListQuery(req.query);
      res.json(await catalog.listGames({ q, limit }));
    })
  );

  app.use(errorHandler);

  return app;
}
