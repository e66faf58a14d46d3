import type { ID, Vec2, Role, DrawingType, TextStyle, TokenMetadata } from "./types.js";

export interface TokenMovedPayload {
  token_id: ID;
  x: number;
  y: number;
  rotation?: number | null;
  scale?: number | null;
}

export interface TokenCreatedPayload {
  layer_id: ID;
  image_path: string;
  x: number;
  y: number;
  scale?: number;
  rotation?: number;
  z_index?: number;
  metadata?: TokenMetadata | null;
}

export interface DrawingCreatedPayload {
  layer_id: ID;
  type: DrawingType;
  points: Vec2[];
  color: string;
  stroke_width: number;
}

export interface TextCreatedPayload {
  layer_id: ID;
  x: number;
  y: number;
  text: string;
  font_size: number;
  color: string;
  style: TextStyle;
}

export type MutationEvent = "token_moved" | "token_created" | "drawing_created" | "text_created";

export type ClientToServer =
  | { t: "ping" }
  | ({ t: "token_moved" } & TokenMovedPayload)
  // gm only
  | ({ t: "token_created" } & TokenCreatedPayload)
  | ({ t: "drawing_created" } & DrawingCreatedPayload)
  | ({ t: "text_created" } & TextCreatedPayload);

export type ServerToClient =
  | { t: "welcome"; client_id: string; role: Role | null }
  | { t: "pong" }
  | ({ t: "token_moved" } & TokenMovedPayload)
  | ({ t: "token_created"; id: ID } & TokenCreatedPayload)
  | ({ t: "drawing_created"; id: ID } & DrawingCreatedPayload)
  | ({ t: "text_created"; id: ID } & TextCreatedPayload)
  | { t: "scene_activated"; scene_id: ID; name: string }
  // only ever sent to the client whose message was rejected
  | { t: "error"; event?: string; message: string };
