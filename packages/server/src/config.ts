import { randomBytes } from "node:crypto";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  MAX_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  HOST: z.string().min(1).default("0.0.0.0"),
  SECRET_KEY: z.string().min(1).optional(),
  TOKEN_TTL_HOURS: z.coerce.number().positive().default(24),
  DATABASE_FILE: z.string().min(1).default("data/vtt.sqlite"),
  ADMIN_USERNAME: z.string().min(1).optional(),
  ADMIN_PASSWORD: z.string().min(1).optional(),
  ARGON2_TIME_COST: z.coerce.number().int().min(2).default(3),
  ARGON2_MEMORY_COST: z.coerce.number().int().min(1024).default(65536),
  ARGON2_PARALLELISM: z.coerce.number().int().min(1).default(4),
  CORS_ORIGIN: z.string().min(1).default("*"),
  MAX_BODY_BYTES: z.coerce.number().int().positive().default(1024 * 1024),
  MAX_MESSAGE_SIZE: z.coerce.number().int().positive().default(1024 * 1024),
  MAX_CLIENTS: z.coerce.number().int().positive().default(100),
  REALTIME_REQUIRE_AUTH: booleanFlag.default("false"),
});

export interface HashOptions {
  timeCost: number;
  memoryCost: number; // KiB
  parallelism: number;
}

export interface AppConfig {
  port: number;
  maxPort: number;
  host: string;
  secretKey: string;
  tokenTtlHours: number;
  databaseFile: string;
  admin: { username: string; password: string; isDefault: boolean };
  hash: HashOptions;
  corsOrigin: string;
  maxBodyBytes: number;
  maxMessageSize: number;
  maxClients: number;
  realtimeRequireAuth: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  let secretKey = e.SECRET_KEY;
  if (!secretKey) {
    console.warn("[config] SECRET_KEY not set, using a random key; sessions will not survive a restart");
    secretKey = randomBytes(32).toString("hex");
  }

  const isDefaultAdmin = !e.ADMIN_USERNAME || !e.ADMIN_PASSWORD;

  return {
    port: e.PORT,
    maxPort: e.MAX_PORT ?? e.PORT + 20,
    host: e.HOST,
    secretKey,
    tokenTtlHours: e.TOKEN_TTL_HOURS,
    databaseFile: e.DATABASE_FILE,
    admin: {
      username: e.ADMIN_USERNAME ?? "admin",
      password: e.ADMIN_PASSWORD ?? "admin",
      isDefault: isDefaultAdmin,
    },
    hash: {
      timeCost: e.ARGON2_TIME_COST,
      memoryCost: e.ARGON2_MEMORY_COST,
      parallelism: e.ARGON2_PARALLELISM,
    },
    corsOrigin: e.CORS_ORIGIN,
    maxBodyBytes: e.MAX_BODY_BYTES,
    maxMessageSize: e.MAX_MESSAGE_SIZE,
    maxClients: e.MAX_CLIENTS,
    realtimeRequireAuth: e.REALTIME_REQUIRE_AUTH,
  };
}
