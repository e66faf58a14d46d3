import { beforeEach, describe, expect, test } from 'vitest';
import type { ID } from '@vtt/shared';
import type { DB } from '../src/db.js';
import { SceneStore } from '../src/scene-store.js';
import { insertUser, memoryDb } from './helpers.js';

function tokenInput(layerId: ID) {
  return { layer_id: layerId, image_path: 'tokens/goblin.png', x: 1, y: 2, scale: 1, rotation: 0, z_index: 0, metadata: null };
}

describe('SceneStore', () => {
  let db: DB;
  let store: SceneStore;
  let gmId: ID;

  beforeEach(() => {
    db = memoryDb();
    store = new SceneStore(db);
    gmId = insertUser(db, 'gm');
  });

  test('creates a scene with background, player and foreground layers', () => {
    const summary = store.createScene('Dungeon', gmId);
    expect(summary).toEqual({ id: 1, name: 'Dungeon', thumbnail_path: null, active: false });

    const scene = store.loadScene(summary.id);
    expect(scene?.layers.map((l) => [l.name, l.type, l.order_index, l.visible])).toEqual([
      ['Background', 'background', 0, true],
      ['Player', 'player', 1, true],
      ['Foreground', 'custom', 2, true],
    ]);
    expect(scene?.background_layer_id).toBe(scene?.layers[0].id);
    expect(scene?.foreground_layer_id).toBe(scene?.layers[2].id);
  });

  test('keeps at most one scene active', () => {
    const a = store.createScene('A', gmId);
    const b = store.createScene('B', gmId);
    const c = store.createScene('C', gmId);

    for (const id of [a.id, b.id, b.id, c.id, a.id]) {
      expect(store.activateScene(id)).toMatchObject({ id, active: true });
      const active = store.listScenes().filter((s) => s.active);
      expect(active.map((s) => s.id)).toEqual([id]);
    }
    expect(store.getScene(c.id)?.active).toBe(false);
  });

  test('activating an unknown scene changes nothing', () => {
    const a = store.createScene('A', gmId);
    store.activateScene(a.id);

    expect(store.activateScene(999)).toBeNull();
    expect(store.getScene(a.id)?.active).toBe(true);
  });

  test('moves a token and only touches rotation and scale when given', () => {
    const scene = store.createScene('Dungeon', gmId);
    const layerId = store.loadScene(scene.id)?.layers[1].id ?? 0;
    const token = store.createToken({ ...tokenInput(layerId), rotation: 45, scale: 2 });
    const id = token?.id ?? 0;

    expect(store.moveToken({ token_id: id, x: 10, y: 20 })).toMatchObject({ x: 10, y: 20, rotation: 45, scale: 2 });
    expect(store.moveToken({ token_id: id, x: 11, y: 21, rotation: null, scale: null })).toMatchObject({
      x: 11,
      y: 21,
      rotation: 45,
      scale: 2,
    });
    expect(store.moveToken({ token_id: id, x: 11, y: 21, rotation: 90 })).toMatchObject({ rotation: 90, scale: 2 });
    expect(store.moveToken({ token_id: id, x: 11, y: 21, scale: 0.5 })).toMatchObject({ rotation: 90, scale: 0.5 });
  });

  test('repeating the same move leaves the token as it was', () => {
    const scene = store.createScene('Dungeon', gmId);
    const layerId = store.loadScene(scene.id)?.layers[1].id ?? 0;
    const id = store.createToken(tokenInput(layerId))?.id ?? 0;

    const first = store.moveToken({ token_id: id, x: 10, y: 20 });
    const second = store.moveToken({ token_id: id, x: 10, y: 20 });

    expect(second).toEqual(first);
    expect(store.getToken(id)).toEqual(first);
  });

  test('returns null for a token or layer that does not exist', () => {
    expect(store.moveToken({ token_id: 42, x: 0, y: 0 })).toBeNull();
    expect(store.createToken(tokenInput(42))).toBeNull();
    expect(
      store.createDrawing({ layer_id: 42, type: 'line', points: [], color: '#fff', stroke_width: 1 }),
    ).toBeNull();
    expect(
      store.createTextElement({ layer_id: 42, x: 0, y: 0, text: 'hi', font_size: 12, color: '#000000', style: 'normal' }),
    ).toBeNull();
  });

  test('stores drawings, text and token metadata on their layer', () => {
    const scene = store.createScene('Dungeon', gmId);
    const [background, player] = store.loadScene(scene.id)?.layers ?? [];

    const drawing = store.createDrawing({
      layer_id: background.id,
      type: 'free',
      points: [{ x: 0, y: 0 }, { x: 5, y: 5 }, { x: 10, y: 0 }],
      color: '#ff0000',
      stroke_width: 3,
    });
    const text = store.createTextElement({
      layer_id: player.id,
      x: 4,
      y: 8,
      text: 'Trap!',
      font_size: 18,
      color: '#222222',
      style: 'bold-italic',
    });
    store.createToken({ ...tokenInput(player.id), metadata: { v: 1, name: 'Goblin', initiative: 12 } });

    const loaded = store.loadScene(scene.id);
    expect(loaded?.layers[0].drawings).toEqual([drawing]);
    expect(loaded?.layers[1].text_elements).toEqual([text]);
    expect(loaded?.layers[1].tokens[0].metadata).toEqual({ v: 1, name: 'Goblin', initiative: 12 });
    expect(loaded?.layers[2]).toMatchObject({ tokens: [], drawings: [], text_elements: [] });
  });

  test('orders tokens on a layer by z-index', () => {
    const scene = store.createScene('Dungeon', gmId);
    const layerId = store.loadScene(scene.id)?.layers[1].id ?? 0;
    store.createToken({ ...tokenInput(layerId), image_path: 'top.png', z_index: 5 });
    store.createToken({ ...tokenInput(layerId), image_path: 'bottom.png', z_index: -1 });
    store.createToken({ ...tokenInput(layerId), image_path: 'middle.png', z_index: 0 });

    const paths = store.loadScene(scene.id)?.layers[1].tokens.map((t) => t.image_path);
    expect(paths).toEqual(['bottom.png', 'middle.png', 'top.png']);
  });

  test('lists scenes in creation order', () => {
    store.createScene('First', gmId);
    store.createScene('Second', gmId);

    expect(store.listScenes().map((s) => s.name)).toEqual(['First', 'Second']);
    expect(store.loadScene(99)).toBeNull();
  });
});
