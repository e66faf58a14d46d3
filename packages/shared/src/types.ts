export type ID = number;

export type Role = "gm" | "player";

export interface Vec2 { x: number; y: number }

export type LayerType = "background" | "player" | "custom";

export type DrawingType = "free" | "line" | "rectangle" | "circle";

export type TextStyle = "normal" | "bold" | "italic" | "bold-italic";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Free-form per-token data. The keys below are the ones clients agree on
 * (metadata version 1); anything else is carried through untouched.
 */
export interface TokenMetadata {
  v?: 1;
  name?: string;
  notes?: string;
  hidden?: boolean;
  [key: string]: JsonValue | undefined;
}

export interface PublicUser {
  id: ID;
  username: string;
  role: Role;
}

export interface SceneToken {
  id: ID;
  image_path: string;
  x: number;
  y: number;
  scale: number;
  rotation: number; // degrees
  z_index: number;
  metadata: TokenMetadata | null;
}

export interface Drawing {
  id: ID;
  type: DrawingType;
  points: Vec2[];
  color: string;
  stroke_width: number;
}

export interface TextElement {
  id: ID;
  x: number;
  y: number;
  text: string;
  font_size: number;
  color: string;
  style: TextStyle;
}

export interface SceneSummary {
  id: ID;
  name: string;
  thumbnail_path: string | null;
  active: boolean;
}

export interface LayerView {
  id: ID;
  name: string;
  order_index: number;
  type: LayerType;
  visible: boolean;
  tokens: SceneToken[];
  drawings: Drawing[];
  text_elements: TextElement[];
}

export interface SceneView extends SceneSummary {
  background_layer_id: ID | null;
  foreground_layer_id: ID | null;
  layers: LayerView[];
}

// HTTP bodies

export interface LoginRequest {
  username: string;
  password: string;
}

export interface LoginResponse {
  token: string;
  user: PublicUser;
}

export interface RegisterRequest {
  username: string;
  password: string;
  role?: Role;
}

export interface CreateSceneRequest {
  name: string;
  thumbnail_path?: string | null;
}

export interface ErrorResponse {
  message: string;
}
