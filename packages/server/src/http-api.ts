import type { IncomingMessage, ServerResponse } from "node:http";
import type { ZodType, ZodTypeDef } from "zod";
import type { ErrorResponse, ID } from "@vtt/shared";
import type { AppContext } from "./app.js";
import { HttpError, NotFoundError, ValidationError } from "./errors.js";
import { authenticateRequest, requireGm } from "./guards.js";
import type { Principal } from "./tokens.js";
import { toPublicUser } from "./user-manager.js";
import { CreateSceneBodySchema, LoginBodySchema, RegisterBodySchema, issueMessage } from "./validation.js";
import { SCENE_NOT_FOUND, viewScene, visibleScenes } from "./visibility.js";

interface RouteRequest {
  params: string[];
  /** Resolves the bearer token; every call after the first reuses the result. */
  principal(): Principal;
  body<T>(schema: ZodType<T, ZodTypeDef, unknown>): Promise<T>;
}

interface RouteResult {
  status?: number;
  body: unknown;
}

type Handler = (ctx: AppContext, request: RouteRequest) => RouteResult | Promise<RouteResult>;

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

function sceneId(params: string[]): ID {
  const id = Number(params[0]);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new NotFoundError(SCENE_NOT_FOUND);
  }
  return id;
}

const routes: Route[] = [
  {
    method: "POST",
    pattern: /^\/api\/auth\/login$/,
    handler: async (ctx, { body }) => {
      const { username, password } = await body(LoginBodySchema);
      const result = await ctx.users.authenticate(username, password);
      if (!result.user) {
        return { status: 401, body: { message: "Invalid credentials" } };
      }
      return { body: { token: result.token, user: toPublicUser(result.user) } };
    },
  },
  {
    method: "POST",
    pattern: /^\/api\/auth\/register$/,
    handler: async (ctx, { principal, body }) => {
      const caller = requireGm(principal());
      const { username, password, role } = await body(RegisterBodySchema);
      const user = await ctx.users.register(username, password, role, caller.userId);
      return { status: 201, body: { message: "User registered successfully", user: toPublicUser(user) } };
    },
  },
  {
    method: "GET",
    pattern: /^\/api\/scenes$/,
    handler: (ctx, { principal }) => {
      const { role } = principal();
      return { body: { scenes: visibleScenes(role, ctx.scenes.listScenes()) } };
    },
  },
  {
    method: "POST",
    pattern: /^\/api\/scenes$/,
    handler: async (ctx, { principal, body }) => {
      const caller = requireGm(principal());
      const { name, thumbnail_path } = await body(CreateSceneBodySchema);
      const scene = ctx.scenes.createScene(name, caller.userId, thumbnail_path);
      console.log(`[http] scene ${scene.id} "${scene.name}" created by user ${caller.userId}`);
      return { status: 201, body: { message: "Scene created successfully", scene } };
    },
  },
  {
    method: "GET",
    pattern: /^\/api\/scenes\/([0-9]+)$/,
    handler: (ctx, { principal, params }) => {
      const { role } = principal();
      const id = sceneId(params);
      return { body: { scene: viewScene(role, ctx.scenes.loadScene(id)) } };
    },
  },
  {
    method: "POST",
    pattern: /^\/api\/scenes\/([0-9]+)\/activate$/,
    handler: (ctx, { principal, params }) => {
      requireGm(principal());
      const scene = ctx.scenes.activateScene(sceneId(params));
      if (!scene) {
        throw new NotFoundError(SCENE_NOT_FOUND);
      }
      ctx.hub.broadcast({ t: "scene_activated", scene_id: scene.id, name: scene.name });
      console.log(`[http] scene ${scene.id} "${scene.name}" activated`);
      return {
        body: { message: "Scene activated successfully", scene: { id: scene.id, name: scene.name, active: true } },
      };
    },
  },
];

async function readJson(req: IncomingMessage, limit: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > limit) {
      throw new HttpError(413, "Request body too large");
    }
    chunks.push(buf);
  }
  if (size === 0) return {};
  try {
    return JSON.parse(Buffer.concat(chunks).toString("utf8"));
  } catch {
    throw new ValidationError("Invalid JSON body");
  }
}

function writeJson(res: ServerResponse, status: number, body: unknown, corsOrigin: string): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(payload),
    "Access-Control-Allow-Origin": corsOrigin,
  });
  res.end(payload);
}

async function dispatch(ctx: AppContext, req: IncomingMessage, res: ServerResponse): Promise<void> {
  const { corsOrigin, maxBodyBytes } = ctx.config;
  const method = req.method ?? "GET";
  const { pathname } = new URL(req.url ?? "/", "http://localhost");

  if (method === "OPTIONS") {
    res.writeHead(204, {
      "Access-Control-Allow-Origin": corsOrigin,
      "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
      "Access-Control-Allow-Headers": "Authorization, Content-Type",
      "Access-Control-Max-Age": "600",
    });
    res.end();
    return;
  }

  if (!pathname.startsWith("/api/")) {
    res.writeHead(200, { "Content-Type": "text/plain", "Access-Control-Allow-Origin": corsOrigin });
    res.end("VTT server is running\n");
    return;
  }

  for (const route of routes) {
    if (route.method !== method) continue;
    const match = route.pattern.exec(pathname);
    if (!match) continue;

    let principal: Principal | undefined;
    const request: RouteRequest = {
      params: match.slice(1),
      principal: () => (principal ??= authenticateRequest(req.headers, ctx.tokens)),
      body: async (schema) => {
        const parsed = schema.safeParse(await readJson(req, maxBodyBytes));
        if (!parsed.success) {
          throw new ValidationError(issueMessage(parsed.error));
        }
        return parsed.data;
      },
    };
    const result = await route.handler(ctx, request);
    writeJson(res, result.status ?? 200, result.body, corsOrigin);
    return;
  }

  throw new NotFoundError();
}

/** Request listener for the JSON API, bound to one application context. */
export function createHttpHandler(ctx: AppContext): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    dispatch(ctx, req, res).catch((error: unknown) => {
      let status = 500;
      let body: ErrorResponse = { message: "Internal server error" };
      if (error instanceof HttpError) {
        status = error.status;
        body = { message: error.message };
      } else {
        console.error(`[http] ${req.method} ${req.url} failed:`, error);
      }
      if (res.headersSent) {
        res.end();
        return;
      }
      writeJson(res, status, body, ctx.config.corsOrigin);
    });
  };
}
