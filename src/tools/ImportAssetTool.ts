import { access } from "node:fs/promises";
import { z } from "zod";
import { UnityCommandSender } from "../communication/types.js";
import { findAssetAtPath } from "./assetQueries.js";
import { errorMessage, getBoolean, getString } from "./responseFields.js";
import { textResponse, ToolResponse } from "./types.js";

export const importAssetSchema = {
  source_path: z.string().min(1).describe("Path to the source file on disk"),
  target_path: z.string().min(1).describe(
    "Path where the asset should be imported in the Unity project (relative to Assets folder)"
  ),
  overwrite: z.boolean().default(false).describe(
    "Whether to overwrite if an asset already exists at the target path"
  ),
};

interface ImportAssetArgs {
  source_path: string;
  target_path: string;
  overwrite?: boolean;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Import a file from local disk into the Unity project.
 */
export async function importAsset(
  args: ImportAssetArgs,
  unityConnection: UnityCommandSender
): Promise<ToolResponse> {
  const { source_path: sourcePath, target_path: targetPath, overwrite = false } = args;

  if (!sourcePath || typeof sourcePath !== "string") {
    return textResponse("Error importing asset: source_path must be a valid string", true);
  }
  if (!targetPath || typeof targetPath !== "string") {
    return textResponse("Error importing asset: target_path must be a valid string", true);
  }

  try {
    if (!(await fileExists(sourcePath))) {
      return textResponse(`Error importing asset: Source file '${sourcePath}' does not exist`, true);
    }

    if (!overwrite && (await findAssetAtPath(unityConnection, targetPath))) {
      return textResponse(
        `Asset already exists at '${targetPath}'. Use overwrite=true to replace it.`,
        true
      );
    }

    const response = await unityConnection.sendCommand("IMPORT_ASSET", {
      source_path: sourcePath,
      target_path: targetPath,
      overwrite,
    });

    if (getBoolean(response, "success") !== true) {
      return textResponse(
        `Error importing asset: ${getString(response, "error") ?? "Unknown error"} (Source: ${sourcePath}, Target: ${targetPath})`,
        true
      );
    }
    return textResponse(getString(response, "message") ?? "Asset imported successfully");
  } catch (error) {
    return textResponse(
      `Error importing asset: ${errorMessage(error)} (Source: ${sourcePath}, Target: ${targetPath})`,
      true
    );
  }
}
