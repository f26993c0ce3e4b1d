// server-node/src/index.ts
import { randomUUID } from "node:crypto";
import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
  ZodTypeProvider,
} from "fastify-type-provider-zod";
import { clusterRoute } from "./routes/cluster";
import { materialsRoute } from "./routes/materials";
import { MaterialCatalog } from "./cluster/materials";
import { settings } from "./settings";
import { HealthResponseSchema } from "./schemas";

export type ServerOptions = {
  catalog?: MaterialCatalog;
  logLevel?: string;
};

// --------------------------- CORS helpers ---------------------------
function normalizeOrigins(input: string | string[] | undefined): string[] {
  if (!input) return [];
  const values = Array.isArray(input) ? input : input.split(",");
  return values.map((s) => s.trim()).filter(Boolean);
}

/**
 * Build the effective CORS allowlist.
 * - Always includes the local dashboard dev origins.
 * - Merges settings.allowedOrigins and env ALLOWED_ORIGINS (comma-separated).
 */
function buildCorsAllowlist(): string[] {
  const DEFAULT_DEV = ["http://localhost:5173", "http://127.0.0.1:5173"];
  const all = new Set<string>([
    ...DEFAULT_DEV,
    ...normalizeOrigins(settings.allowedOrigins),
    ...normalizeOrigins(process.env.ALLOWED_ORIGINS),
  ]);
  return Array.from(all);
}

export async function createServer(options: ServerOptions = {}) {
  const catalog = options.catalog ?? MaterialCatalog.fromFile(settings.data.materials);

  const app = Fastify({
    logger: {
      level: options.logLevel ?? settings.logLevel,
      base: { service: "cluster-status-api", env: settings.env },
    },
    bodyLimit: settings.bodyLimitBytes,
    genReqId: () => randomUUID(),
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // --------------------------- security & basics ---------------------------
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
  });

  const allowlist = buildCorsAllowlist();
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true); // server-to-server / curl
      if (allowlist.includes(origin)) return cb(null, true);
      app.log.warn({ origin }, "CORS blocked origin");
      cb(new Error("CORS"), false);
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  });
  app.log.debug({ allowlist }, "CORS allowlist configured");

  await app.register(rateLimit, {
    max: settings.rateLimit.requests,
    timeWindow: `${settings.rateLimit.windowSeconds}s`,
  });

  // --------------------------- Swagger / OpenAPI ---------------------------
  await app.register(swagger, {
    openapi: {
      info: { title: "Cluster Printer Status API", version: settings.version },
      servers: [{ url: process.env.SWAGGER_SERVER ?? `http://localhost:${settings.port}` }],
    },
    transform: jsonSchemaTransform,
  });

  await app.register(swaggerUi, {
    routePrefix: "/docs",
    uiConfig: { docExpansion: "list", deepLinking: false },
    staticCSP: true,
  });

  // --------------------------- instrumentation ---------------------------
  app.addHook("onResponse", (request, reply, done) => {
    const route = request.routeOptions.url ?? request.raw.url ?? "unknown";
    const durationMs = Number(reply.elapsedTime.toFixed(2));
    request.log.info({ route, statusCode: reply.statusCode, durationMs }, "request completed");
    done();
  });

  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "unhandled error");
    }
    const message = statusCode >= 500 ? "Internal server error" : error.message || "Request failed";
    reply.status(statusCode).send({ error: message });
  });

  // --------------------------- routes ---------------------------
  app.get(
    "/health",
    {
      schema: {
        tags: ["ops"],
        response: { 200: HealthResponseSchema },
      },
    },
    async () => ({
      status: "ok" as const,
      uptime_ms: Math.round(process.uptime() * 1000),
    }),
  );

  await app.register(clusterRoute, { prefix: "/api", catalog });
  await app.register(materialsRoute, { prefix: "/api", catalog });

  return app;
}
