import { v4 as uuidv4 } from "uuid";
import type { ServerToClient, MutationEvent } from "@vtt/shared";
import { isGm } from "./guards.js";
import type { SceneStore } from "./scene-store.js";
import type { Principal } from "./tokens.js";
import {
  ClientMessageSchema,
  issueMessage,
  type TokenMovedInput,
  type TokenCreatedInput,
  type DrawingCreatedInput,
  type TextCreatedInput,
} from "./validation.js";

/** The part of a ws WebSocket the hub talks to. */
export interface ClientSocket {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string): void;
}

export interface ClientRec {
  id: string;
  principal: Principal | null;
  socket: ClientSocket;
}

export interface HubOptions {
  maxClients?: number;
  maxMessageSize?: number;
}

const MUTATION_EVENTS: ReadonlySet<string> = new Set<MutationEvent>([
  "token_moved",
  "token_created",
  "drawing_created",
  "text_created",
]);

function eventName(raw: unknown): string | undefined {
  if (typeof raw !== "object" || raw === null || !("t" in raw)) return undefined;
  return typeof raw.t === "string" && MUTATION_EVENTS.has(raw.t) ? raw.t : undefined;
}

/**
 * One broadcast group holding every connected client. A mutation is
 * validated, committed through the scene store, then relayed to everyone
 * but its sender; rejections go back to the sender alone.
 */
export class RealtimeHub {
  private readonly clients = new Map<string, ClientRec>();
  private readonly maxClients: number;
  private readonly maxMessageSize: number;

  constructor(private readonly scenes: SceneStore, options: HubOptions = {}) {
    this.maxClients = options.maxClients ?? 100;
    this.maxMessageSize = options.maxMessageSize ?? 1024 * 1024;
  }

  get size(): number {
    return this.clients.size;
  }

  /** Registers a socket; `null` when the hub is full. */
  connect(socket: ClientSocket, principal: Principal | null = null): ClientRec | null {
    if (this.clients.size >= this.maxClients) {
      console.warn(`[hub] client limit reached (${this.maxClients}), rejecting connection`);
      return null;
    }
    const client: ClientRec = { id: "c-" + uuidv4(), principal, socket };
    this.clients.set(client.id, client);
    console.log(
      `[hub] client ${client.id} connected as ${principal ? `user ${principal.userId} (${principal.role})` : "anonymous"} ` +
        `(${this.clients.size}/${this.maxClients})`
    );
    this.send(client, { t: "welcome", client_id: client.id, role: principal?.role ?? null });
    return client;
  }

  disconnect(client: ClientRec): void {
    if (this.clients.delete(client.id)) {
      console.log(`[hub] client ${client.id} disconnected`);
    }
  }

  /** Sends to every client except `except`. */
  broadcast(msg: ServerToClient, except?: ClientRec): void {
    const data = JSON.stringify(msg);
    for (const c of this.clients.values()) {
      if (c === except) continue;
      this.sendRaw(c, data);
    }
  }

  /** `data` is one text frame; its size is counted in UTF-8 bytes. */
  handleMessage(client: ClientRec, data: string | Buffer): void {
    const size = typeof data === "string" ? Buffer.byteLength(data, "utf8") : data.length;
    if (size > this.maxMessageSize) {
      console.warn(`[hub] message too large from ${client.id}: ${size} bytes`);
      return this.reject(client, undefined, "Message too large");
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data.toString());
    } catch {
      console.warn(`[hub] invalid JSON from ${client.id}`);
      return this.reject(client, undefined, "Invalid JSON");
    }

    const parsed = ClientMessageSchema.safeParse(raw);
    if (!parsed.success) {
      return this.reject(client, eventName(raw), issueMessage(parsed.error, true));
    }

    const msg = parsed.data;
    switch (msg.t) {
      case "ping":
        this.send(client, { t: "pong" });
        break;
      case "token_moved":
        this.tokenMoved(client, msg);
        break;
      case "token_created":
        this.tokenCreated(client, msg);
        break;
      case "drawing_created":
        this.drawingCreated(client, msg);
        break;
      case "text_created":
        this.textCreated(client, msg);
        break;
    }
  }

  private tokenMoved(client: ClientRec, msg: TokenMovedInput): void {
    const token = this.scenes.moveToken(msg);
    if (!token) {
      return this.reject(client, msg.t, `Token ${msg.token_id} not found`);
    }
    this.broadcast(msg, client);
  }

  private tokenCreated(client: ClientRec, msg: TokenCreatedInput): void {
    if (!isGm(client.principal)) {
      return this.reject(client, msg.t, "GM privileges required");
    }
    const token = this.scenes.createToken(msg);
    if (!token) {
      return this.reject(client, msg.t, `Layer ${msg.layer_id} not found`);
    }
    this.broadcast({ ...msg, id: token.id }, client);
  }

  private drawingCreated(client: ClientRec, msg: DrawingCreatedInput): void {
    const drawing = this.scenes.createDrawing(msg);
    if (!drawing) {
      return this.reject(client, msg.t, `Layer ${msg.layer_id} not found`);
    }
    this.broadcast({ ...msg, id: drawing.id }, client);
  }

  private textCreated(client: ClientRec, msg: TextCreatedInput): void {
    const text = this.scenes.createTextElement(msg);
    if (!text) {
      return this.reject(client, msg.t, `Layer ${msg.layer_id} not found`);
    }
    this.broadcast({ ...msg, id: text.id }, client);
  }

  private reject(client: ClientRec, event: string | undefined, message: string): void {
    console.warn(`[hub] rejected ${event ?? "message"} from ${client.id}: ${message}`);
    this.send(client, event ? { t: "error", event, message } : { t: "error", message });
  }

  private send(client: ClientRec, msg: ServerToClient): void {
    this.sendRaw(client, JSON.stringify(msg));
  }

  private sendRaw(client: ClientRec, data: string): void {
    try {
      if (client.socket.readyState === client.socket.OPEN) {
        client.socket.send(data);
      } else {
        console.warn(`[hub] skipped send to ${client.id}: socket state ${client.socket.readyState}`);
      }
    } catch (error) {
      console.error(`[hub] failed to send to ${client.id}:`, error);
    }
  }
}
