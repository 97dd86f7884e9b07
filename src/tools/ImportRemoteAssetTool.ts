import { z } from "zod";
import { formatImportResult, RemoteAssetImporter } from "../remote/RemoteAssetImporter.js";
import { textResponse, ToolResponse } from "./types.js";

export const importRemoteAssetSchema = {
  url: z.string().min(1).describe("URL of the asset to download"),
  target_path: z.string().min(1).describe(
    "Path the asset is imported to in the Unity project (relative to Assets folder)"
  ),
  overwrite: z.boolean().default(false).describe("Whether to overwrite an existing asset"),
  temp_download: z.boolean().default(true).describe(
    "Download into a temporary directory that is deleted afterwards instead of the persistent download cache"
  ),
};

interface ImportRemoteAssetArgs {
  url: string;
  target_path: string;
  overwrite?: boolean;
  temp_download?: boolean;
}

/**
 * Download an asset from a URL and import it into the Unity project.
 */
export async function importRemoteAsset(
  args: ImportRemoteAssetArgs,
  importer: RemoteAssetImporter
): Promise<ToolResponse> {
  const result = await importer.importRemoteAsset({
    url: args.url,
    targetPath: args.target_path,
    overwrite: args.overwrite ?? false,
    useTempStorage: args.temp_download ?? true,
  });
  return textResponse(formatImportResult(result), result.status !== "imported");
}
