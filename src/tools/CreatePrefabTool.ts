import { z } from "zod";
import { UnityCommandSender } from "../communication/types.js";
import { findAssetAtPath, sceneObjectExists, withPrefabExtension } from "./assetQueries.js";
import { errorMessage, getBoolean, getString } from "./responseFields.js";
import { textResponse, ToolResponse } from "./types.js";

export const createPrefabSchema = {
  object_name: z.string().min(1).describe("Name of the GameObject in the scene to create the prefab from"),
  prefab_path: z.string().min(1).describe("Path where the prefab should be saved (relative to Assets folder)"),
  overwrite: z.boolean().default(false).describe("Whether to overwrite an existing prefab at the path"),
};

interface CreatePrefabArgs {
  object_name: string;
  prefab_path: string;
  overwrite?: boolean;
}

/**
 * Save a scene GameObject as a new prefab asset.
 */
export async function createPrefab(
  args: CreatePrefabArgs,
  unityConnection: UnityCommandSender
): Promise<ToolResponse> {
  const { object_name: objectName, overwrite = false } = args;

  if (!objectName || typeof objectName !== "string") {
    return textResponse("Error creating prefab: object_name must be a valid string", true);
  }
  if (!args.prefab_path || typeof args.prefab_path !== "string") {
    return textResponse("Error creating prefab: prefab_path must be a valid string", true);
  }

  const prefabPath = withPrefabExtension(args.prefab_path);
  try {
    if (!(await sceneObjectExists(unityConnection, objectName))) {
      return textResponse(`GameObject '${objectName}' not found in the scene.`, true);
    }

    if (!overwrite && (await findAssetAtPath(unityConnection, prefabPath, "Prefab"))) {
      return textResponse(
        `Prefab already exists at '${prefabPath}'. Use overwrite=true to replace it.`,
        true
      );
    }

    const response = await unityConnection.sendCommand("CREATE_PREFAB", {
      object_name: objectName,
      prefab_path: prefabPath,
      overwrite,
    });

    if (getBoolean(response, "success") !== true) {
      return textResponse(
        `Error creating prefab: ${getString(response, "error") ?? "Unknown error"} (Object: ${objectName}, Path: ${prefabPath})`,
        true
      );
    }
    return textResponse(`Prefab created successfully at ${getString(response, "path") ?? prefabPath}`);
  } catch (error) {
    return textResponse(
      `Error creating prefab: ${errorMessage(error)} (Object: ${objectName}, Path: ${prefabPath})`,
      true
    );
  }
}
