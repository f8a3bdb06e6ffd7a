/**
 * HTTP front end for a ModelRegistry.
 *
 * Routes map one-to-one onto registry operations. Request bodies and query
 * strings are validated with zod (400); registry errors are returned with
 * their own status and structured body.
 */

import * as http from "node:http";

import { z } from "zod";

import { describeError, isRegistryError } from "./errors.js";
import type { ArtifactFile } from "./integrity.js";
import { silentLogger, type Logger } from "./logger.js";
import { validateMetadataInput } from "./metadata.js";
import type { ModelRegistry } from "./registry.js";

export interface RegistryServerOptions {
  readonly registry: ModelRegistry;
  readonly host: string;
  readonly port: number;
  readonly logger?: Logger;
  /** Largest accepted request body; inline artifacts count against it. */
  readonly maxBodyBytes?: number;
}

const DEFAULT_MAX_BODY_BYTES = 64 * 1024 * 1024;

const OpenMap = z.record(z.string(), z.unknown());

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const Base64String = z
  .string()
  .refine((value) => value.length % 4 === 0 && BASE64.test(value), { message: "not valid base64" });

const RegisterBodySchema = z
  .object({
    task: z.string(),
    model: z.string(),
    version: z.string(),
    artifacts: z.array(z.object({ name: z.string(), contentBase64: Base64String })).optional(),
    artifactsDir: z.string().optional(),
    metadata: OpenMap,
    metrics: OpenMap.optional(),
    featureSchema: OpenMap.optional(),
    alias: z.string().nullable().optional(),
    actor: z.string().optional(),
    reason: z.string().nullable().optional(),
  })
  .refine((body) => (body.artifacts === undefined) !== (body.artifactsDir === undefined), {
    message: "exactly one of artifacts or artifactsDir is required",
  });

const PromoteBodySchema = z.object({
  task: z.string(),
  model: z.string(),
  alias: z.string(),
  version: z.string(),
  actor: z.string(),
  reason: z.string().nullable().optional(),
});

const VerifyBodySchema = z.object({ task: z.string(), ref: z.string() });

const queryFlag = z
  .string()
  .optional()
  .transform((value) => value === "1" || value === "true");

const ResolveQuerySchema = z.object({ task: z.string(), ref: z.string(), verify: queryFlag });
const AuditQuerySchema = z.object({ task: z.string(), model: z.string() });
const ModelsQuerySchema = z.object({ task: z.string().optional(), model: z.string().optional() });

type HttpErrorKind = "BadRequest" | "PayloadTooLarge";

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly issues: string[] = [],
    readonly kind: HttpErrorKind = "BadRequest",
  ) {
    super(message);
  }
}

type Handler = (req: http.IncomingMessage, url: URL) => Promise<{ status: number; body: unknown }>;

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new HttpError(
      400,
      `Invalid ${what}`,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function decodeArtifacts(artifacts: { name: string; contentBase64: string }[]): ArtifactFile[] {
  return artifacts.map((artifact) => ({ name: artifact.name, content: Buffer.from(artifact.contentBase64, "base64") }));
}

export class RegistryServer {
  private readonly _server: http.Server;
  private readonly _options: RegistryServerOptions;
  private readonly _logger: Logger;
  private readonly _routes: Map<string, Map<string, Handler>>;

  constructor(options: RegistryServerOptions) {
    this._options = options;
    this._logger = options.logger ?? silentLogger();
    this._routes = this._buildRoutes();
    this._server = http.createServer((req: http.IncomingMessage, res: http.ServerResponse) => {
      this._handleRequest(req, res).catch((error: unknown) => {
        this._logger.error("request failed", { method: req.method, url: req.url, error: describeError(error) });
        if (!res.headersSent) {
          this._send(res, 500, { error: { kind: "InternalError", message: describeError(error) } });
        } else if (!res.writableEnded) {
          res.end();
        }
      });
    });
  }

  async start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this._server.once("error", reject);
      this._server.listen(this._options.port, this._options.host, () => {
        this._server.off("error", reject);
        this._logger.info("listening", { host: this._options.host, port: this.port });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this._server.close((err: Error | undefined) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Bound port; differs from the configured one when that was 0. */
  get port(): number {
    const address = this._server.address();
    return address !== null && typeof address === "object" ? address.port : this._options.port;
  }

  private _buildRoutes(): Map<string, Map<string, Handler>> {
    const registry = this._options.registry;
    const routes = new Map<string, Map<string, Handler>>();
    const route = (method: string, pathname: string, handler: Handler): void => {
      const byMethod = routes.get(pathname) ?? new Map<string, Handler>();
      byMethod.set(method, handler);
      routes.set(pathname, byMethod);
    };

    route("GET", "/health", async () => {
      const report = await registry.health();
      return { status: report.ok ? 200 : 503, body: report };
    });

    route("POST", "/v1/register", async (req) => {
      const body = parseWith(RegisterBodySchema, await this._readBody(req), "register request");
      const result = await registry.register({
        task: body.task,
        model: body.model,
        version: body.version,
        artifacts: body.artifacts ? decodeArtifacts(body.artifacts) : { dir: body.artifactsDir ?? "" },
        metadata: validateMetadataInput(body.metadata),
        derived: { metrics: body.metrics, featureSchema: body.featureSchema },
        alias: body.alias ?? null,
        actor: body.actor,
        reason: body.reason ?? null,
      });
      return { status: 201, body: result };
    });

    route("GET", "/v1/resolve", async (_req, url) => {
      const query = parseWith(ResolveQuerySchema, Object.fromEntries(url.searchParams), "query");
      return { status: 200, body: await registry.resolve(query.task, query.ref, { verify: query.verify }) };
    });

    route("GET", "/v1/show", async (_req, url) => {
      const query = parseWith(ResolveQuerySchema, Object.fromEntries(url.searchParams), "query");
      return { status: 200, body: await registry.show(query.task, query.ref, { verify: query.verify }) };
    });

    route("POST", "/v1/promote", async (req) => {
      const body = parseWith(PromoteBodySchema, await this._readBody(req), "promote request");
      return { status: 200, body: await registry.promote(body) };
    });

    route("POST", "/v1/verify", async (req) => {
      const body = parseWith(VerifyBodySchema, await this._readBody(req), "verify request");
      return { status: 200, body: await registry.verify(body.task, body.ref) };
    });

    route("GET", "/v1/audit", async (_req, url) => {
      const query = parseWith(AuditQuerySchema, Object.fromEntries(url.searchParams), "query");
      return { status: 200, body: { entries: await registry.audit(query.task, query.model) } };
    });

    route("GET", "/v1/models", async (_req, url) => {
      const { task, model } = parseWith(ModelsQuerySchema, Object.fromEntries(url.searchParams), "query");
      if (task === undefined) {
        if (model !== undefined) throw new HttpError(400, "model requires task");
        return { status: 200, body: { tasks: await registry.listTasks() } };
      }
      if (model === undefined) {
        return { status: 200, body: { task, models: await registry.listModels(task) } };
      }
      const [versions, aliases] = await Promise.all([
        registry.listVersions(task, model),
        registry.listAliases(task, model),
      ]);
      return { status: 200, body: { task, model, versions, aliases } };
    });

    return routes;
  }

  private async _handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://registry.local");
    const byMethod = this._routes.get(url.pathname);
    if (!byMethod) {
      this._send(res, 404, { error: { kind: "NotFound", message: `No route for ${url.pathname}` } });
      return;
    }
    const handler = byMethod.get(req.method ?? "GET");
    if (!handler) {
      res.setHeader("Allow", [...byMethod.keys()].join(", "));
      this._send(res, 405, { error: { kind: "MethodNotAllowed", message: `${req.method ?? ""} not allowed` } });
      return;
    }

    try {
      const { status, body } = await handler(req, url);
      this._send(res, status, body);
    } catch (error) {
      if (error instanceof HttpError) {
        this._send(res, error.status, { error: { kind: error.kind, message: error.message, issues: error.issues } });
        return;
      }
      if (isRegistryError(error)) {
        this._logger.warn("request rejected", { route: url.pathname, code: error.code, status: error.httpStatus });
        this._send(res, error.httpStatus, { error: error.toJSON() });
        return;
      }
      throw error;
    }
  }

  private _send(res: http.ServerResponse, status: number, body: unknown): void {
    res.statusCode = status;
    res.setHeader("Content-Type", "application/json");
    res.end(JSON.stringify(body));
  }

  /**
   * Reads and parses the request body as JSON. Oversized bodies are 413,
   * unparseable ones 400.
   */
  private async _readBody(req: http.IncomingMessage): Promise<unknown> {
    const limit = this._options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buffer.byteLength;
      if (size > limit) throw new HttpError(413, `Request body exceeds ${String(limit)} bytes`, [], "PayloadTooLarge");
      chunks.push(buffer);
    }
    try {
      return JSON.parse(Buffer.concat(chunks).toString("utf8"));
    } catch {
      throw new HttpError(400, "Invalid JSON body");
    }
  }
}
