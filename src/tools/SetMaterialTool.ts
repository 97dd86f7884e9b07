import { z } from "zod";
import { UnityCommandSender } from "../communication/types.js";
import { sceneObjectExists } from "./assetQueries.js";
import { definedParams } from "./passThrough.js";
import { errorMessage, getBoolean, getObjectList, getString } from "./responseFields.js";
import { textResponse, ToolResponse } from "./types.js";

export const MATERIALS_FOLDER = "Assets/Materials";

export const setMaterialSchema = {
  object_name: z.string().min(1).describe("Target GameObject"),
  material_name: z.string().min(1).optional().describe(
    "Material name. When given, a shared material asset is created or reused in the Materials folder"
  ),
  color: z.array(z.number()).optional().describe("[R, G, B] or [R, G, B, A] values in 0.0-1.0"),
  create_if_missing: z.boolean().default(true).describe("Whether to create the material if it doesn't exist"),
};

interface SetMaterialArgs {
  object_name: string;
  material_name?: string;
  color?: number[];
  create_if_missing?: boolean;
}

const CHANNELS = "RGBA";

/** Returns an error sentence for an invalid color, or null when it is usable. */
export function validateColor(color: number[]): string | null {
  if (color.length !== 3 && color.length !== 4) {
    return `Error: Color must have 3 (RGB) or 4 (RGBA) components, but got ${color.length}.`;
  }
  for (let i = 0; i < color.length; i++) {
    const value = color[i];
    if (typeof value !== "number" || Number.isNaN(value)) {
      return `Error: Color component at index ${i} is not a number.`;
    }
    if (value < 0 || value > 1) {
      return `Error: Color ${CHANNELS[i]} value must be in the range 0.0-1.0, but got ${value}.`;
    }
  }
  return null;
}

/**
 * Apply a shared or per-instance material to a scene object.
 */
export async function setMaterial(
  args: SetMaterialArgs,
  unityConnection: UnityCommandSender
): Promise<ToolResponse> {
  const { object_name: objectName, material_name: materialName, color, create_if_missing: createIfMissing = true } = args;

  try {
    if (!(await sceneObjectExists(unityConnection, objectName))) {
      return textResponse(`GameObject '${objectName}' not found in the scene.`, true);
    }

    if (materialName) {
      const listing = await unityConnection.sendCommand("GET_ASSET_LIST", {
        type: "Material",
        search_pattern: materialName,
        folder: MATERIALS_FOLDER,
      });
      const materialExists = getObjectList(listing, "assets").some(
        (asset) => getString(asset, "name") === materialName
      );
      if (!materialExists && !createIfMissing) {
        return textResponse(
          `Material '${materialName}' not found. Use create_if_missing=true to create it.`,
          true
        );
      }
    }

    if (color && color.length > 0) {
      const problem = validateColor(color);
      if (problem) return textResponse(problem, true);
    }

    const result = await unityConnection.sendCommand(
      "SET_MATERIAL",
      definedParams({
        object_name: objectName,
        create_if_missing: createIfMissing,
        material_name: materialName || undefined,
        color: color && color.length > 0 ? color : undefined,
      })
    );

    if (getBoolean(result, "success") === false) {
      return textResponse(`Error setting material: ${getString(result, "error") ?? "Unknown error"}`, true);
    }

    const appliedName = getString(result, "material_name") ?? "unknown";
    const materialPath = getString(result, "path");
    return textResponse(
      materialPath
        ? `Applied shared material '${appliedName}' to ${objectName} (saved at ${materialPath})`
        : `Applied instance material '${appliedName}' to ${objectName}`
    );
  } catch (error) {
    return textResponse(`Error setting material: ${errorMessage(error)}`, true);
  }
}
