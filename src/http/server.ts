import { timingSafeEqual } from "crypto";
import Fastify, { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { logger } from "../logger";
import { AdapterRegistry } from "../bulk/adapter-registry";
import { BulkSessionService } from "../bulk/bulk-session-service";
import { BulkError } from "../bulk/errors";
import {
  cancelSchema,
  domainsSchema,
  healthSchema,
  startSchema,
  statusSchema,
  turnSchema,
} from "./schemas";

interface ActorParams {
  actorId: string;
}

interface StartBody {
  domain: string;
  params: Record<string, unknown>;
  batchSize?: number;
}

interface TurnBody {
  message: string;
}

export interface ServerOptions {
  apiKey: string;
  sessions: BulkSessionService;
  registry: AdapterRegistry;
}

export async function buildServer(opts: ServerOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    requestTimeout: 120_000,
  });

  // 1. Swagger plugin (must register before routes)
  await app.register(swagger, {
    openapi: {
      info: {
        title: "Bulk Turn Engine",
        description:
          "Turn-by-turn bulk operations: start an operation, then confirm each batch through conversational turns.",
        version: "1.0.0",
      },
      components: {
        securitySchemes: {
          bearerAuth: {
            type: "http",
            scheme: "bearer",
            description: "Static API key configured via API_KEY env var",
          },
        },
      },
    },
  });

  // 2. Swagger UI
  await app.register(swaggerUi, {
    routePrefix: "/docs",
    uiConfig: {
      persistAuthorization: true,
    },
  });

  // 3. Auth hook: /health and /docs* stay open
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    if (request.url === "/health" || request.url.startsWith("/docs")) return;

    const auth = request.headers.authorization ?? "";
    const expected = `Bearer ${opts.apiKey}`;
    const isValid =
      auth.length === expected.length &&
      timingSafeEqual(Buffer.from(auth), Buffer.from(expected));

    if (!isValid) {
      return reply.code(401).send({ error: "Unauthorized" });
    }
  });

  app.get("/health", { schema: healthSchema }, async () => {
    return { status: "ok" };
  });

  app.get("/bulk/domains", { schema: domainsSchema }, async () => {
    return { domains: opts.registry.domains() };
  });

  app.post<{ Params: ActorParams; Body: StartBody }>(
    "/actors/:actorId/bulk",
    { schema: startSchema },
    async (request, reply) => {
      const { actorId } = request.params;
      const { domain, params, batchSize } = request.body;
      return handleBulk(reply, 201, () =>
        opts.sessions.startOperation(actorId, domain, params, batchSize)
      );
    }
  );

  app.get<{ Params: ActorParams }>(
    "/actors/:actorId/bulk",
    { schema: statusSchema },
    async (request, reply) => {
      const status = opts.sessions.getStatus(request.params.actorId);
      if (!status) {
        return reply.code(404).send({ error: "No bulk operation in progress" });
      }
      return status;
    }
  );

  app.delete<{ Params: ActorParams }>(
    "/actors/:actorId/bulk",
    { schema: cancelSchema },
    async (request, reply) => {
      const { actorId } = request.params;
      return handleBulk(reply, 200, async () => opts.sessions.cancelOperation(actorId));
    }
  );

  app.post<{ Params: ActorParams; Body: TurnBody }>(
    "/actors/:actorId/turns",
    { schema: turnSchema },
    async (request, reply) => {
      const { actorId } = request.params;
      return handleBulk(reply, 200, () =>
        opts.sessions.handleTurn(actorId, request.body.message)
      );
    }
  );

  return app;
}

export async function startServer(
  opts: ServerOptions & { port: number }
): Promise<FastifyInstance> {
  const app = await buildServer(opts);
  await app.listen({ port: opts.port, host: "0.0.0.0" });
  logger.info({ tag: "HTTP", port: opts.port }, `Bulk server listening on port ${opts.port}`);
  return app;
}

export function statusCodeFor(err: BulkError): number {
  switch (err.code) {
    case "VALIDATION":
    case "NOTHING_TO_PROCESS":
      return 400;
    case "UNKNOWN_DOMAIN":
      return 404;
    case "SESSION_ALREADY_ACTIVE":
    case "SESSION_BUSY":
    case "NO_ACTIVE_SESSION":
      return 409;
    case "TOO_MANY_ITEMS":
      return 422;
    default:
      return err.retryable ? 503 : 500;
  }
}

async function handleBulk(
  reply: FastifyReply,
  successCode: number,
  fn: () => Promise<unknown>
): Promise<FastifyReply> {
  try {
    const result = await fn();
    return reply.code(successCode).send(result);
  } catch (err) {
    const status = err instanceof BulkError ? statusCodeFor(err) : 500;
    if (status === 500 || !(err instanceof BulkError)) {
      logger.error({ tag: "HTTP", err }, "Bulk handler error");
      return reply.code(500).send({ error: "Internal server error" });
    }
    return reply
      .code(status)
      .send({ error: err.message, code: err.code, retryable: err.retryable });
  }
}
