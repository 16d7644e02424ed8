// ===========================================================================
//  src/server/http.ts   (Express façade over the PasteService)
// ===========================================================================

import express from "express";
import type { ErrorRequestHandler, NextFunction, Request, Response } from "express";
import helmet from "helmet";
import compression from "compression";
import pinoHttp from "pino-http";
import { z } from "zod";

import type { PasteService, PasteSummary } from "./core/paste-service";
import { PasteError, ValidationError } from "./core/errors";
import { httpLogger, logError } from "./utils/logger";

export interface HttpOptions {
  /** Largest accepted paste in bytes; shown on `/` and bounds the JSON body. */
  maxSize: number;
}

// ────────────────  Request schemas  ──────────────────────────────────────

const createPasteBody = z.object({
  content: z.string({ required_error: "content is required", invalid_type_error: "content must be a string" }),
  language: z.string().max(64).nullish(),
  title: z.string().max(256).nullish(),
  expires_in_hours: z.number({ invalid_type_error: "expires_in_hours must be a number" }).nullish(),
  burn_after_read: z.boolean().optional(),
});

const listQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(50),
});

function parse<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError(`${where}${issue?.message ?? "invalid request"}`);
  }
  return result.data;
}

// ────────────────  Helpers  ──────────────────────────────────────────────

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not catch rejected handlers on its own. */
const handle = (fn: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };

const iso = (date: Date | null): string | null => (date ? date.toISOString() : null);

const summaryJson = (paste: PasteSummary) => ({
  id: paste.id,
  url: paste.url,
  title: paste.title,
  language: paste.language,
  size: paste.size,
  created_at: paste.createdAt.toISOString(),
  expires_at: iso(paste.expiresAt),
  burn_after_read: paste.burnAfterRead,
});

/** body-parser and friends throw http-errors carrying `status`. */
const clientStatus = (error: unknown): number | undefined => {
  if (!(error instanceof Error) || !("status" in error)) return undefined;
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
};

const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  if (error instanceof PasteError && error.status < 500) {
    res.status(error.status).json({ error: error.message });
    return;
  }

  const clientError = clientStatus(error);
  if (clientError !== undefined) {
    res.status(clientError).json({ error: clientError === 413 ? "Request body too large" : "Malformed request body" });
    return;
  }

  // storage details (paths, errno) stay in the log
  logError(httpLogger, error, { url: req.url, method: req.method });
  const status = error instanceof PasteError ? error.status : 500;
  res.status(status).json({ error: "Internal server error" });
};

// ────────────────  App  ──────────────────────────────────────────────────

export function createApp(service: PasteService, options: HttpOptions): express.Express {
  const app = express();

  app.use(pinoHttp({
    logger: httpLogger,
    autoLogging: {
      ignore: (req) => req.url === "/health",
    },
    customLogLevel: (_req, res, err) => {
      if (res.statusCode >= 500 || err) return "error";
      if (res.statusCode >= 400) return "warn";
      return "debug";
    },
  }));

  app
    .use(helmet())
    .use(compression())
    // JSON escaping can inflate a body well past the paste itself; the
    // service enforces the exact byte limit.
    .use(express.json({ limit: options.maxSize * 6 + 16_384 }));

  app.get("/", (_req, res) => {
    res.json({
      name: "Quick Paste",
      total_pastes: service.count(),
      max_size_bytes: options.maxSize,
      api: {
        create: "POST /api/paste",
        list: "GET /api/pastes",
        view: "GET /{id}",
        raw: "GET /{id}/raw",
        delete: "DELETE /api/paste/{id}",
      },
    });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", pastes: service.count() });
  });

  app.post("/api/paste", handle(async (req, res) => {
    const body = parse(createPasteBody, req.body);
    const created = await service.create({
      content: body.content,
      language: body.language,
      title: body.title,
      expiresInHours: body.expires_in_hours,
      burnAfterRead: body.burn_after_read,
    });

    res.status(201).location(created.url).json({
      id: created.id,
      url: created.url,
      raw_url: created.rawUrl,
      created_at: created.createdAt.toISOString(),
      expires_at: iso(created.expiresAt),
      language: created.language,
    });
  }));

  app.get("/api/pastes", handle(async (req, res) => {
    const { limit } = parse(listQuery, req.query);
    const listing = await service.list({ limit });
    res.json({ pastes: listing.pastes.map(summaryJson), total: listing.total });
  }));

  app.delete("/api/paste/:id", handle(async (req, res) => {
    const id = req.params.id;
    await service.delete(id);
    res.json({ ok: true, deleted: id });
  }));

  // Express routes HEAD through GET handlers; a HEAD must not burn the paste.
  app.get("/:id/raw", handle(async (req, res) => {
    if (req.method === "HEAD") {
      const record = await service.inspect(req.params.id);
      if (record.burnAfterRead) res.set("Cache-Control", "no-store");
      res.type("text/plain").end();
      return;
    }
    const { record, body } = await service.read(req.params.id, true);
    if (record.burnAfterRead) res.set("Cache-Control", "no-store");
    res.type("text/plain").send(body);
  }));

  app.get("/:id", handle(async (req, res) => {
    if (req.method === "HEAD") {
      const record = await service.inspect(req.params.id);
      if (record.burnAfterRead) res.set("Cache-Control", "no-store");
      res.type("html").end();
      return;
    }
    const { record, body } = await service.read(req.params.id, false);
    if (record.burnAfterRead) res.set("Cache-Control", "no-store");
    res.type("html").send(body);
  }));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });
  app.use(errorHandler);

  return app;
}
