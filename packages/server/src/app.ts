import { createServer, type IncomingMessage, type Server as HTTPServer } from "node:http";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import type { AppConfig } from "./config.js";
import { type DB, openDatabase } from "./db.js";
import { InvalidTokenError } from "./errors.js";
import { createHttpHandler } from "./http-api.js";
import { PasswordHasher } from "./passwords.js";
import { RealtimeHub } from "./realtime-hub.js";
import { SceneStore } from "./scene-store.js";
import { type Principal, TokenService } from "./tokens.js";
import { UserManager } from "./user-manager.js";

/** Everything a request or realtime event handler needs, built once per server. */
export interface AppContext {
  config: AppConfig;
  db: DB;
  tokens: TokenService;
  users: UserManager;
  scenes: SceneStore;
  hub: RealtimeHub;
}

export interface ContextOverrides {
  db?: DB;
  clock?: () => number;
}

export function createAppContext(config: AppConfig, overrides: ContextOverrides = {}): AppContext {
  const db = overrides.db ?? openDatabase(config.databaseFile);
  const tokens = new TokenService({ secret: config.secretKey, ttlHours: config.tokenTtlHours, clock: overrides.clock });
  const users = new UserManager(db, new PasswordHasher(config.hash), tokens);
  const scenes = new SceneStore(db);
  const hub = new RealtimeHub(scenes, { maxClients: config.maxClients, maxMessageSize: config.maxMessageSize });
  return { config, db, tokens, users, scenes, hub };
}

/** Close code sent when the socket's session token is missing or bad. */
export const WS_UNAUTHORIZED = 4401;

function socketPrincipal(ctx: AppContext, req: IncomingMessage): Principal | null {
  const url = new URL(req.url ?? "/", "http://localhost");
  const token = url.searchParams.get("token");
  if (!token) {
    if (ctx.config.realtimeRequireAuth) {
      throw new InvalidTokenError("Authentication token is missing");
    }
    return null;
  }
  return ctx.tokens.validateToken(token);
}

function frameBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  return Array.isArray(data) ? Buffer.concat(data) : Buffer.from(data);
}

function onConnection(ctx: AppContext, ws: WebSocket, req: IncomingMessage): void {
  let principal: Principal | null;
  try {
    principal = socketPrincipal(ctx, req);
  } catch (error) {
    const reason = error instanceof Error ? error.message : "Invalid authentication token";
    console.warn(`[hub] refused connection: ${reason}`);
    ws.close(WS_UNAUTHORIZED, reason);
    return;
  }

  const client = ctx.hub.connect(ws, principal);
  if (!client) {
    ws.close(1013, "Server overloaded");
    return;
  }

  ws.on("message", (data: RawData) => ctx.hub.handleMessage(client, frameBuffer(data)));
  ws.on("close", () => ctx.hub.disconnect(client));
  ws.on("error", (error) => {
    console.error(`[hub] WebSocket error for client ${client.id}:`, error);
    ctx.hub.disconnect(client);
  });
}

/** HTTP API plus the realtime channel at /ws, sharing one context. Not yet listening. */
export function createAppServer(ctx: AppContext): { server: HTTPServer; wss: WebSocketServer } {
  const server = createServer(createHttpHandler(ctx));
  const wss = new WebSocketServer({ server, path: "/ws", maxPayload: ctx.config.maxMessageSize });
  wss.on("connection", (ws, req) => onConnection(ctx, ws, req));
  wss.on("error", (error) => {
    console.warn(`[hub] server error: ${error.message}`);
  });
  return { server, wss };
}
