import http from "node:http";
import { URL } from "node:url";
import crypto from "node:crypto";
import { z, ZodError } from "zod";
import type { Logger } from "../config/logger";
import { httpStatusFor, LibraryError } from "../library/errors";
import type { LibraryService } from "../library/service";

function withSecurityHeaders(headers: Record<string, string>): Record<string, string> {
  return {
    "x-content-type-options": "nosniff",
    "x-frame-options": "DENY",
    "cache-control": "no-store",
    ...headers,
  };
}

export type RuntimeStatusProvider = () => Record<string, unknown> | Promise<Record<string, unknown>>;
export type DependencyCheck = () => Promise<{ ok: boolean; latencyMs: number; error?: string }>;
export type Authenticator = (req: http.IncomingMessage) => string | null | Promise<string | null>;

const MAX_BODY_BYTES = 1_000_000;

class RequestError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = "RequestError";
  }
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new RequestError(413, "Request body too large");
    }
    chunks.push(buffer);
  }
  if (!chunks.length) return {};
  const raw = Buffer.concat(chunks).toString("utf8");
  try {
    return JSON.parse(raw);
  } catch {
    throw new RequestError(400, "Invalid JSON body");
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value[0]) return value[0];
  return undefined;
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new RequestError(400, "Malformed path segment");
  }
}

/** Reads the caller's id from `x-library-user-id`; real deployments swap in their own authenticator. */
export const headerAuthenticator: Authenticator = (req) => {
  const value = firstHeader(req.headers["x-library-user-id"])?.trim();
  return value ? value : null;
};

const CreateBookBody = z.object({
  title: z.string().trim().min(1).max(500),
  author: z.string().trim().min(1).max(300),
  isbn: z.string().trim().max(20).nullable().optional(),
  genres: z.array(z.string().max(100)).max(50).default([]),
  filePath: z.string().max(1000).nullable().optional(),
});

const ReviewBody = z.object({
  rating: z.number().int().min(1).max(5),
  text: z.string().min(1).max(10_000),
});

const PreferencesBody = z.object({
  favoriteGenres: z.array(z.string().max(100)).max(100).default([]),
  favoriteAuthors: z.array(z.string().max(300)).max(100).default([]),
});

const RecommendationQuery = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

const BOOK_ROUTE = /^\/api\/books\/([^/]+)\/(analysis|borrow|return|reviews)$/;

export function startHttpServer(params: {
  host: string;
  port: number;
  logger: Logger;
  service: LibraryService;
  pgCheck?: DependencyCheck;
  redisCheck?: DependencyCheck;
  getRuntimeStatus?: RuntimeStatusProvider;
  authenticate?: Authenticator;
  allowedOrigins?: string[];
}): http.Server {
  const {
    host,
    port,
    logger,
    service,
    pgCheck,
    redisCheck,
    getRuntimeStatus,
    authenticate = headerAuthenticator,
    allowedOrigins = [],
  } = params;

  const corsHeadersFor = (origin: string | null): Record<string, string> => {
    if (!origin || !allowedOrigins.includes(origin)) return {};
    return {
      "access-control-allow-origin": origin,
      "access-control-allow-headers": "content-type, x-library-user-id",
      "access-control-allow-methods": "GET,POST,PUT,OPTIONS",
      "access-control-max-age": "600",
      vary: "Origin",
    };
  };

  const server = http.createServer(async (req, res) => {
    const requestId = firstHeader(req.headers["x-request-id"])?.trim() || crypto.randomUUID();
    const startedAt = Date.now();
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", `http://${host}:${port}`);
    const originHeader = req.headers.origin ?? null;
    const corsHeaders = corsHeadersFor(originHeader);
    let statusCode = 500;

    const sendJson = (status: number, payload: Record<string, unknown>): void => {
      statusCode = status;
      res.writeHead(status, withSecurityHeaders({ "content-type": "application/json", ...corsHeaders, "x-request-id": requestId }));
      res.end(JSON.stringify(payload));
    };

    try {
      if (method === "OPTIONS") {
        statusCode = !originHeader || allowedOrigins.includes(originHeader) ? 204 : 403;
        res.writeHead(statusCode, withSecurityHeaders({ ...corsHeaders, "x-request-id": requestId }));
        res.end();
        return;
      }

      if (method === "GET" && url.pathname === "/healthz") {
        sendJson(200, { ok: true, service: "library-intelligence", at: new Date().toISOString() });
        return;
      }

      if (method === "GET" && url.pathname === "/readyz") {
        const skipped = { ok: true, latencyMs: 0, skipped: true };
        const [postgres, redis] = await Promise.all([
          pgCheck ? pgCheck() : Promise.resolve(skipped),
          redisCheck ? redisCheck() : Promise.resolve(skipped),
        ]);
        const ok = postgres.ok && redis.ok;
        sendJson(ok ? 200 : 503, { ok, checks: { postgres, redis }, at: new Date().toISOString() });
        return;
      }

      if (method === "GET" && url.pathname === "/api/status") {
        const runtime = getRuntimeStatus ? await getRuntimeStatus() : {};
        sendJson(200, {
          ok: true,
          at: new Date().toISOString(),
          process: { pid: process.pid, uptimeSec: Math.floor(process.uptime()) },
          runtime,
        });
        return;
      }

      if (!url.pathname.startsWith("/api/")) {
        sendJson(404, { ok: false, message: "Not found" });
        return;
      }

      const userId = await authenticate(req);
      if (!userId) {
        sendJson(401, { ok: false, message: "Missing user identity." });
        return;
      }

      if (method === "POST" && url.pathname === "/api/books") {
        const body = CreateBookBody.parse(await readJsonBody(req));
        const book = await service.ingestBook(body);
        sendJson(201, { ok: true, book });
        return;
      }

      if (method === "GET" && url.pathname === "/api/recommendations") {
        const query = RecommendationQuery.parse({ limit: url.searchParams.get("limit") ?? undefined });
        const recommendations = await service.getRecommendations(userId, query.limit);
        sendJson(200, { ok: true, recommendations });
        return;
      }

      if (method === "PUT" && url.pathname === "/api/preferences") {
        const body = PreferencesBody.parse(await readJsonBody(req));
        const preferences = await service.updatePreferences(userId, body);
        sendJson(200, { ok: true, preferences });
        return;
      }

      const bookRoute = BOOK_ROUTE.exec(url.pathname);
      if (bookRoute) {
        const bookId = decodePathSegment(bookRoute[1]);
        const action = bookRoute[2];

        if (method === "GET" && action === "analysis") {
          const analysis = await service.getBookAnalysis(bookId);
          sendJson(200, { ok: true, analysis });
          return;
        }
        if (method === "POST" && action === "borrow") {
          const borrow = await service.borrowBook(userId, bookId);
          sendJson(201, { ok: true, borrow });
          return;
        }
        if (method === "POST" && action === "return") {
          const borrow = await service.returnBook(userId, bookId);
          sendJson(200, { ok: true, borrow });
          return;
        }
        if (method === "POST" && action === "reviews") {
          const body = ReviewBody.parse(await readJsonBody(req));
          const review = await service.submitReview(userId, bookId, body);
          sendJson(201, { ok: true, review });
          return;
        }
        sendJson(405, { ok: false, message: "Method not allowed" });
        return;
      }

      sendJson(404, { ok: false, message: "Not found" });
    } catch (error) {
      if (error instanceof LibraryError) {
        sendJson(httpStatusFor(error.code), { ok: false, code: error.code, message: error.message });
        return;
      }
      if (error instanceof RequestError) {
        sendJson(error.statusCode, { ok: false, message: error.message });
        return;
      }
      if (error instanceof ZodError) {
        sendJson(400, {
          ok: false,
          message: "Invalid request",
          issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
        });
        return;
      }
      logger.error("library_http_handler_error", {
        requestId,
        method,
        path: url.pathname,
        message: error instanceof Error ? error.message : String(error),
      });
      sendJson(500, { ok: false, message: "Internal server error" });
    } finally {
      logger.info("library_http_request", {
        requestId,
        method,
        path: url.pathname,
        statusCode,
        durationMs: Date.now() - startedAt,
      });
    }
  });

  server.listen(port, host, () => {
    logger.info("library_http_listening", { host, port });
  });

  return server;
}
