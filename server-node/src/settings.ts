import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";

const ROOT_DIR = resolve(process.env.APP_ROOT || process.cwd());

function resolveVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(resolve(ROOT_DIR, "package.json"), "utf-8"));
    const pkg = z.object({ version: z.string().optional() }).parse(raw);
    return pkg.version ?? "0.0.0";
  } catch (err) {
    console.warn("Failed to read package version", err);
    return "0.0.0";
  }
}

export const settings = {
  env: process.env.ENV || "development",
  port: Number(process.env.PORT || 8000),
  host: process.env.HOST || "0.0.0.0",
  logLevel: process.env.LOG_LEVEL ?? "info",
  allowedOrigins: (process.env.ALLOWED_ORIGINS || "http://localhost:5173").split(","),
  rateLimit: {
    requests: Number(process.env.RATE_LIMIT_REQUESTS || 120),
    windowSeconds: Number(process.env.RATE_LIMIT_WINDOW_SECONDS || 60),
  },
  bodyLimitBytes: Number(process.env.BODY_LIMIT_KB || 512) * 1024,
  cameraStreamPort: Number(process.env.CAMERA_STREAM_PORT || 8080),
  version: resolveVersion(),
  rootDir: ROOT_DIR,
  data: {
    materials: resolve(ROOT_DIR, process.env.MATERIALS_FILE || "config/materials.json"),
  },
};
