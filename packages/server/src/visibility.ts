import type { Role, LayerView, SceneSummary, SceneView } from "@vtt/shared";
import { NotFoundError } from "./errors.js";

export const SCENE_NOT_FOUND = "Scene not found";

export function canSeeScene(role: Role, scene: SceneSummary): boolean {
  return role === "gm" || scene.active;
}

export function canSeeLayerContents(role: Role, layer: Pick<LayerView, "type">): boolean {
  return role === "gm" || layer.type === "player";
}

/** Scenes the requester may list: all of them for a gm, the active one otherwise. */
export function visibleScenes<S extends SceneSummary>(role: Role, scenes: readonly S[]): S[] {
  return scenes.filter((scene) => canSeeScene(role, scene));
}

/**
 * The scene as the requester may see it. Players only get the active scene
 * and only the contents of player layers; every other layer keeps its
 * identity with empty element lists. A hidden scene is reported as missing.
 */
export function viewScene(role: Role, scene: SceneView | null): SceneView {
  if (!scene || !canSeeScene(role, scene)) {
    throw new NotFoundError(SCENE_NOT_FOUND);
  }
  if (role === "gm") {
    return scene;
  }
  return {
    ...scene,
    layers: scene.layers.map((layer) =>
      canSeeLayerContents(role, layer) ? layer : { ...layer, tokens: [], drawings: [], text_elements: [] }
    ),
  };
}
