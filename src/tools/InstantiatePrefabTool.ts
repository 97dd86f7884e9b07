import { z } from "zod";
import { UnityCommandSender } from "../communication/types.js";
import { findAssetAtPath, withPrefabExtension } from "./assetQueries.js";
import { errorMessage, getBoolean, getString } from "./responseFields.js";
import { textResponse, ToolResponse } from "./types.js";

export const instantiatePrefabSchema = {
  prefab_path: z.string().min(1).describe("Path to the prefab asset (relative to Assets folder)"),
  position_x: z.number().default(0).describe("X position in world space"),
  position_y: z.number().default(0).describe("Y position in world space"),
  position_z: z.number().default(0).describe("Z position in world space"),
  rotation_x: z.number().default(0).describe("X rotation in degrees"),
  rotation_y: z.number().default(0).describe("Y rotation in degrees"),
  rotation_z: z.number().default(0).describe("Z rotation in degrees"),
};

type TransformField =
  | "position_x"
  | "position_y"
  | "position_z"
  | "rotation_x"
  | "rotation_y"
  | "rotation_z";

const TRANSFORM_FIELDS: TransformField[] = [
  "position_x",
  "position_y",
  "position_z",
  "rotation_x",
  "rotation_y",
  "rotation_z",
];

type InstantiatePrefabArgs = { prefab_path: string } & Partial<Record<TransformField, number>>;

/**
 * Instantiate a prefab into the current scene at a given position and rotation.
 */
export async function instantiatePrefab(
  args: InstantiatePrefabArgs,
  unityConnection: UnityCommandSender
): Promise<ToolResponse> {
  if (!args.prefab_path || typeof args.prefab_path !== "string") {
    return textResponse("Error instantiating prefab: prefab_path must be a valid string", true);
  }

  const transform: Record<TransformField, number> = {
    position_x: 0,
    position_y: 0,
    position_z: 0,
    rotation_x: 0,
    rotation_y: 0,
    rotation_z: 0,
  };
  for (const field of TRANSFORM_FIELDS) {
    const value = args[field] ?? 0;
    if (typeof value !== "number" || !Number.isFinite(value)) {
      return textResponse(`Error instantiating prefab: ${field} must be a number`, true);
    }
    transform[field] = value;
  }

  const prefabPath = withPrefabExtension(args.prefab_path);
  try {
    if (!(await findAssetAtPath(unityConnection, prefabPath, "Prefab"))) {
      return textResponse(`Prefab '${prefabPath}' not found in the project.`, true);
    }

    const response = await unityConnection.sendCommand("INSTANTIATE_PREFAB", {
      prefab_path: prefabPath,
      ...transform,
    });

    if (getBoolean(response, "success") !== true) {
      return textResponse(
        `Error instantiating prefab: ${getString(response, "error") ?? "Unknown error"} (Path: ${prefabPath})`,
        true
      );
    }
    return textResponse(
      `Prefab instantiated successfully as '${getString(response, "instance_name") ?? "unknown"}'`
    );
  } catch (error) {
    return textResponse(`Error instantiating prefab: ${errorMessage(error)} (Path: ${prefabPath})`, true);
  }
}
