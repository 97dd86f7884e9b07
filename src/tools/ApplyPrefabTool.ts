import { z } from "zod";
import { UnityCommandSender } from "../communication/types.js";
import { sceneObjectExists } from "./assetQueries.js";
import { errorMessage, getBoolean, getString } from "./responseFields.js";
import { textResponse, ToolResponse } from "./types.js";

export const applyPrefabSchema = {
  object_name: z.string().min(1).describe("Name of the prefab instance in the scene"),
};

/**
 * Push overrides on a scene prefab instance back to its prefab asset.
 */
export async function applyPrefab(
  args: { object_name: string },
  unityConnection: UnityCommandSender
): Promise<ToolResponse> {
  const objectName = args.object_name;
  if (!objectName || typeof objectName !== "string") {
    return textResponse("Error applying prefab changes: object_name must be a valid string", true);
  }

  try {
    if (!(await sceneObjectExists(unityConnection, objectName))) {
      return textResponse(`GameObject '${objectName}' not found in the scene.`, true);
    }

    const properties = await unityConnection.sendCommand("GET_OBJECT_PROPERTIES", { name: objectName });
    if (getBoolean(properties, "isPrefabInstance") !== true) {
      return textResponse(`GameObject '${objectName}' is not a prefab instance.`, true);
    }

    const response = await unityConnection.sendCommand("APPLY_PREFAB", { object_name: objectName });
    if (getBoolean(response, "success") === false) {
      return textResponse(
        `Error applying prefab changes: ${getString(response, "error") ?? "Unknown error"}`,
        true
      );
    }
    return textResponse(getString(response, "message") ?? "Prefab changes applied successfully");
  } catch (error) {
    return textResponse(`Error applying prefab changes: ${errorMessage(error)}`, true);
  }
}
