import { UnityCommandSender } from "../communication/types.js";
import { getObjectList, getString } from "./responseFields.js";

export const ASSET_ROOT = "Assets";

/** Split an asset path into its folder (empty at the root) and file name. */
export function splitAssetPath(assetPath: string): { folder: string; fileName: string } {
  const parts = assetPath.split("/");
  const fileName = parts.pop() ?? "";
  return { folder: parts.join("/"), fileName };
}

/** Root a project-relative path under `Assets/`. */
export function normalizeAssetPath(assetPath: string): string {
  const trimmed = assetPath.replace(/^\/+/, "");
  return trimmed.startsWith(`${ASSET_ROOT}/`) ? trimmed : `${ASSET_ROOT}/${trimmed}`;
}

export function withPrefabExtension(prefabPath: string): string {
  return prefabPath.toLowerCase().endsWith(".prefab") ? prefabPath : `${prefabPath}.prefab`;
}

/**
 * Ask Unity for assets named like the last path segment inside the path's
 * folder and report whether one sits exactly at `assetPath`.
 */
export async function findAssetAtPath(
  unity: UnityCommandSender,
  assetPath: string,
  type?: string
): Promise<boolean> {
  const { folder, fileName } = splitAssetPath(assetPath);
  const response = await unity.sendCommand("GET_ASSET_LIST", {
    ...(type ? { type } : {}),
    search_pattern: fileName,
    folder: folder || ASSET_ROOT,
  });
  return getObjectList(response, "assets").some((asset) => getString(asset, "path") === assetPath);
}

export async function sceneObjectExists(unity: UnityCommandSender, name: string): Promise<boolean> {
  const response = await unity.sendCommand("FIND_OBJECTS_BY_NAME", { name });
  const objects = response.objects;
  return Array.isArray(objects) && objects.length > 0;
}
