import type {
  ID,
  LayerType,
  DrawingType,
  TextStyle,
  SceneSummary,
  SceneView,
  LayerView,
  SceneToken,
  Drawing,
  TextElement,
} from "@vtt/shared";
import { type DB, type Statement, parseJsonColumn } from "./db.js";
import { PointsSchema, TokenMetadataSchema } from "./validation.js";
import type { TokenMovedInput, TokenCreatedInput, DrawingCreatedInput, TextCreatedInput } from "./validation.js";

interface SceneRow {
  id: ID;
  name: string;
  thumbnail_path: string | null;
  active: number;
  owner_id: ID;
  background_layer_id: ID | null;
  foreground_layer_id: ID | null;
}

interface LayerRow {
  id: ID;
  scene_id: ID;
  name: string;
  order_index: number;
  type: LayerType;
  visible: number;
}

interface TokenRow {
  id: ID;
  layer_id: ID;
  image_path: string;
  x: number;
  y: number;
  scale: number;
  rotation: number;
  z_index: number;
  metadata: string | null;
}

interface DrawingRow {
  id: ID;
  layer_id: ID;
  type: DrawingType;
  points: string;
  color: string;
  stroke_width: number;
}

interface TextRow {
  id: ID;
  layer_id: ID;
  x: number;
  y: number;
  text: string;
  font_size: number;
  color: string;
  style: TextStyle;
}

/** Layers every new scene starts with, bottom to top. */
const DEFAULT_LAYERS: ReadonlyArray<{ name: string; type: LayerType }> = [
  { name: "Background", type: "background" },
  { name: "Player", type: "player" },
  { name: "Foreground", type: "custom" },
];

function toSummary(row: SceneRow): SceneSummary {
  return { id: row.id, name: row.name, thumbnail_path: row.thumbnail_path, active: row.active === 1 };
}

function toToken(row: TokenRow): SceneToken {
  return {
    id: row.id,
    image_path: row.image_path,
    x: row.x,
    y: row.y,
    scale: row.scale,
    rotation: row.rotation,
    z_index: row.z_index,
    metadata: row.metadata === null ? null : parseJsonColumn(TokenMetadataSchema, row.metadata, "tokens.metadata"),
  };
}

function toDrawing(row: DrawingRow): Drawing {
  return {
    id: row.id,
    type: row.type,
    points: parseJsonColumn(PointsSchema, row.points, "drawings.points"),
    color: row.color,
    stroke_width: row.stroke_width,
  };
}

function toText(row: TextRow): TextElement {
  return {
    id: row.id,
    x: row.x,
    y: row.y,
    text: row.text,
    font_size: row.font_size,
    color: row.color,
    style: row.style,
  };
}

function groupByLayer<R extends { layer_id: ID }, T>(rows: R[], map: (row: R) => T): Map<ID, T[]> {
  const out = new Map<ID, T[]>();
  for (const row of rows) {
    const list = out.get(row.layer_id) ?? [];
    list.push(map(row));
    out.set(row.layer_id, list);
  }
  return out;
}

/**
 * Scenes and everything drawn on them. Each mutation runs in its own
 * transaction; a `null` result means the row it refers to does not exist.
 */
export class SceneStore {
  private readonly stmts: {
    allScenes: Statement<[], SceneRow>;
    sceneById: Statement<[ID], SceneRow>;
    insertScene: Statement<[string, string | null, ID]>;
    setSceneLayers: Statement<[ID, ID, ID]>;
    clearActive: Statement<[]>;
    setActive: Statement<[ID]>;
    layersForScene: Statement<[ID], LayerRow>;
    layerById: Statement<[ID], LayerRow>;
    insertLayer: Statement<[ID, string, number, LayerType, number]>;
    tokensForScene: Statement<[ID], TokenRow>;
    tokenById: Statement<[ID], TokenRow>;
    insertToken: Statement<[ID, string, number, number, number, number, number, string | null]>;
    moveToken: Statement<[number, number, number | null, number | null, ID]>;
    drawingsForScene: Statement<[ID], DrawingRow>;
    insertDrawing: Statement<[ID, DrawingType, string, string, number]>;
    textsForScene: Statement<[ID], TextRow>;
    insertText: Statement<[ID, number, number, string, number, string, TextStyle]>;
  };

  constructor(private readonly db: DB) {
    const inScene = "layer_id IN (SELECT id FROM layers WHERE scene_id = ?)";
    this.stmts = {
      allScenes: db.prepare<[], SceneRow>("SELECT * FROM scenes ORDER BY id"),
      sceneById: db.prepare<[ID], SceneRow>("SELECT * FROM scenes WHERE id = ?"),
      insertScene: db.prepare<[string, string | null, ID]>("INSERT INTO scenes (name, thumbnail_path, owner_id) VALUES (?, ?, ?)"),
      setSceneLayers: db.prepare<[ID, ID, ID]>("UPDATE scenes SET background_layer_id = ?, foreground_layer_id = ? WHERE id = ?"),
      clearActive: db.prepare<[]>("UPDATE scenes SET active = 0 WHERE active <> 0"),
      setActive: db.prepare<[ID]>("UPDATE scenes SET active = 1 WHERE id = ?"),
      layersForScene: db.prepare<[ID], LayerRow>("SELECT * FROM layers WHERE scene_id = ? ORDER BY order_index"),
      layerById: db.prepare<[ID], LayerRow>("SELECT * FROM layers WHERE id = ?"),
      insertLayer: db.prepare<[ID, string, number, LayerType, number]>("INSERT INTO layers (scene_id, name, order_index, type, visible) VALUES (?, ?, ?, ?, ?)"),
      tokensForScene: db.prepare<[ID], TokenRow>(`SELECT * FROM tokens WHERE ${inScene} ORDER BY z_index, id`),
      tokenById: db.prepare<[ID], TokenRow>("SELECT * FROM tokens WHERE id = ?"),
      insertToken: db.prepare<[ID, string, number, number, number, number, number, string | null]>(
        "INSERT INTO tokens (layer_id, image_path, x, y, scale, rotation, z_index, metadata) VALUES (?, ?, ?, ?, ?, ?, ?, ?)"
      ),
      moveToken: db.prepare<[number, number, number | null, number | null, ID]>(
        "UPDATE tokens SET x = ?, y = ?, rotation = COALESCE(?, rotation), scale = COALESCE(?, scale) WHERE id = ?"
      ),
      drawingsForScene: db.prepare<[ID], DrawingRow>(`SELECT * FROM drawings WHERE ${inScene} ORDER BY id`),
      insertDrawing: db.prepare<[ID, DrawingType, string, string, number]>(
        "INSERT INTO drawings (layer_id, type, points, color, stroke_width) VALUES (?, ?, ?, ?, ?)"
      ),
      textsForScene: db.prepare<[ID], TextRow>(`SELECT * FROM text_elements WHERE ${inScene} ORDER BY id`),
      insertText: db.prepare<[ID, number, number, string, number, string, TextStyle]>(
        "INSERT INTO text_elements (layer_id, x, y, text, font_size, color, style) VALUES (?, ?, ?, ?, ?, ?, ?)"
      ),
    };
  }

  listScenes(): SceneSummary[] {
    return this.stmts.allScenes.all().map(toSummary);
  }

  getScene(id: ID): SceneSummary | null {
    const row = this.stmts.sceneById.get(id);
    return row ? toSummary(row) : null;
  }

  /** The scene with every layer and every element on it, unfiltered. */
  loadScene(id: ID): SceneView | null {
    return this.db.transaction((): SceneView | null => {
      const row = this.stmts.sceneById.get(id);
      if (!row) return null;

      const tokens = groupByLayer(this.stmts.tokensForScene.all(id), toToken);
      const drawings = groupByLayer(this.stmts.drawingsForScene.all(id), toDrawing);
      const texts = groupByLayer(this.stmts.textsForScene.all(id), toText);

      const layers: LayerView[] = this.stmts.layersForScene.all(id).map((layer) => ({
        id: layer.id,
        name: layer.name,
        order_index: layer.order_index,
        type: layer.type,
        visible: layer.visible === 1,
        tokens: tokens.get(layer.id) ?? [],
        drawings: drawings.get(layer.id) ?? [],
        text_elements: texts.get(layer.id) ?? [],
      }));

      return {
        ...toSummary(row),
        background_layer_id: row.background_layer_id,
        foreground_layer_id: row.foreground_layer_id,
        layers,
      };
    })();
  }

  /** Creates the scene together with its background, player and foreground layers. */
  createScene(name: string, ownerId: ID, thumbnailPath: string | null = null): SceneSummary {
    return this.db.transaction((): SceneSummary => {
      const sceneId = Number(this.stmts.insertScene.run(name, thumbnailPath, ownerId).lastInsertRowid);
      const layerIds = DEFAULT_LAYERS.map((layer, index) =>
        Number(this.stmts.insertLayer.run(sceneId, layer.name, index, layer.type, 1).lastInsertRowid)
      );
      this.stmts.setSceneLayers.run(layerIds[0], layerIds[layerIds.length - 1], sceneId);
      return { id: sceneId, name, thumbnail_path: thumbnailPath, active: false };
    })();
  }

  /** Makes `id` the only active scene. */
  activateScene(id: ID): SceneSummary | null {
    return this.db.transaction((): SceneSummary | null => {
      const row = this.stmts.sceneById.get(id);
      if (!row) return null;
      this.stmts.clearActive.run();
      this.stmts.setActive.run(id);
      return { ...toSummary(row), active: true };
    })();
  }

  getToken(id: ID): SceneToken | null {
    const row = this.stmts.tokenById.get(id);
    return row ? toToken(row) : null;
  }

  createToken(input: Omit<TokenCreatedInput, "t">): SceneToken | null {
    return this.db.transaction((): SceneToken | null => {
      if (!this.stmts.layerById.get(input.layer_id)) return null;
      const id = Number(
        this.stmts.insertToken.run(
          input.layer_id,
          input.image_path,
          input.x,
          input.y,
          input.scale,
          input.rotation,
          input.z_index,
          input.metadata === null ? null : JSON.stringify(input.metadata)
        ).lastInsertRowid
      );
      const row = this.stmts.tokenById.get(id);
      return row ? toToken(row) : null;
    })();
  }

  /** Position always changes; rotation and scale only when given. */
  moveToken(input: Omit<TokenMovedInput, "t">): SceneToken | null {
    return this.db.transaction((): SceneToken | null => {
      const result = this.stmts.moveToken.run(input.x, input.y, input.rotation ?? null, input.scale ?? null, input.token_id);
      if (result.changes === 0) return null;
      const row = this.stmts.tokenById.get(input.token_id);
      return row ? toToken(row) : null;
    })();
  }

  createDrawing(input: Omit<DrawingCreatedInput, "t">): Drawing | null {
    return this.db.transaction((): Drawing | null => {
      if (!this.stmts.layerById.get(input.layer_id)) return null;
      const id = Number(
        this.stmts.insertDrawing.run(input.layer_id, input.type, JSON.stringify(input.points), input.color, input.stroke_width)
          .lastInsertRowid
      );
      return { id, type: input.type, points: input.points, color: input.color, stroke_width: input.stroke_width };
    })();
  }

  createTextElement(input: Omit<TextCreatedInput, "t">): TextElement | null {
    return this.db.transaction((): TextElement | null => {
      if (!this.stmts.layerById.get(input.layer_id)) return null;
      const id = Number(
        this.stmts.insertText.run(input.layer_id, input.x, input.y, input.text, input.font_size, input.color, input.style)
          .lastInsertRowid
      );
      return {
        id,
        x: input.x,
        y: input.y,
        text: input.text,
        font_size: input.font_size,
        color: input.color,
        style: input.style,
      };
    })();
  }
}
