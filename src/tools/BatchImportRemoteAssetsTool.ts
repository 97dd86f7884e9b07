import { z } from "zod";
import {
  DEFAULT_IMPORT_FOLDER,
  formatBatchResults,
  RemoteAssetImporter,
} from "../remote/RemoteAssetImporter.js";
import { textResponse, ToolResponse } from "./types.js";

export const batchImportRemoteAssetsSchema = {
  urls: z.array(z.string()).describe("URLs of the assets to download"),
  target_folder: z.string().default(DEFAULT_IMPORT_FOLDER).describe(
    "Folder the assets are imported into (relative to Assets folder)"
  ),
  overwrite: z.boolean().default(false).describe("Whether to overwrite existing assets"),
};

interface BatchImportRemoteAssetsArgs {
  urls: string[];
  target_folder?: string;
  overwrite?: boolean;
}

/**
 * Download and import several assets, one after another.
 */
export async function batchImportRemoteAssets(
  args: BatchImportRemoteAssetsArgs,
  importer: RemoteAssetImporter
): Promise<ToolResponse> {
  const items = await importer.batchImportRemoteAssets(
    args.urls ?? [],
    args.target_folder ?? DEFAULT_IMPORT_FOLDER,
    args.overwrite ?? false
  );
  const anyFailed = items.some((item) => item.result.status !== "imported");
  return textResponse(formatBatchResults(items), anyFailed);
}
