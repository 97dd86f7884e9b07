import { access, mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { UnityCommandSender } from "../communication/types.js";
import { CONFIG } from "../config.js";
import { findAssetAtPath, normalizeAssetPath } from "../tools/assetQueries.js";
import { errorMessage, getBoolean, getString } from "../tools/responseFields.js";
import { Downloader, downloadToFile } from "./downloadToFile.js";

export const DEFAULT_IMPORT_FOLDER = "Assets/ImportedAssets";

export type ImportStatus =
  | "imported"
  | "already_exists"
  | "invalid_argument"
  | "download_failed"
  | "file_missing"
  | "import_failed"
  | "unexpected_error";

export interface ImportRequest {
  url: string;
  targetPath: string;
  overwrite?: boolean;
  useTempStorage?: boolean;
}

export interface ImportResult {
  status: ImportStatus;
  message: string;
  sourceUrl: string;
  targetPath: string;
}

export interface BatchItemResult {
  index: number;
  total: number;
  fileName: string;
  result: ImportResult;
}

export interface RemoteAssetImporterOptions {
  unity: UnityCommandSender;
  /** Persistent download directory used when temp storage is off. */
  cacheRoot: string;
  download?: Downloader;
  downloadTimeoutMs?: number;
  /** Called when a temp download directory could not be removed. */
  onCleanupError?: (error: unknown, path: string) => void;
}

/** Last path segment of a URL with any query string removed. */
export function filenameFromUrl(url: string): string {
  const lastSegment = url.split("/").pop() ?? "";
  return lastSegment.split("?")[0];
}

function logCleanupError(error: unknown, path: string): void {
  console.error(`[Unity MCP] Warning: could not remove temporary download ${path}: ${errorMessage(error)}`);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Downloads assets from URLs and hands them to Unity's importer.
 */
export class RemoteAssetImporter {
  private readonly unity: UnityCommandSender;
  private readonly cacheRoot: string;
  private readonly download: Downloader;
  private readonly downloadTimeoutMs: number;
  private readonly onCleanupError: (error: unknown, path: string) => void;

  constructor(options: RemoteAssetImporterOptions) {
    this.unity = options.unity;
    this.cacheRoot = options.cacheRoot;
    this.download = options.download ?? downloadToFile;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? CONFIG.DOWNLOAD_TIMEOUT_MS;
    this.onCleanupError = options.onCleanupError ?? logCleanupError;
  }

  /** Never rejects: every failure is reported as an `ImportResult`. */
  async importRemoteAsset(request: ImportRequest): Promise<ImportResult> {
    const { url, overwrite = false, useTempStorage = true } = request;

    if (!url || typeof url !== "string") {
      return this.result("invalid_argument", "Error: url must be a valid string", String(url), String(request.targetPath));
    }
    if (!request.targetPath || typeof request.targetPath !== "string") {
      return this.result("invalid_argument", "Error: target_path must be a valid string", url, String(request.targetPath));
    }

    const targetPath = normalizeAssetPath(request.targetPath);
    const fileName = filenameFromUrl(url);
    if (!fileName) {
      return this.result("invalid_argument", `Error: could not determine a file name from URL: ${url}`, url, targetPath);
    }

    let tempDir: string | undefined;
    try {
      if (!overwrite && (await findAssetAtPath(this.unity, targetPath))) {
        return this.result(
          "already_exists",
          `Asset already exists at '${targetPath}'. Use overwrite=true to replace it.`,
          url,
          targetPath
        );
      }

      let downloadDir: string;
      if (useTempStorage) {
        tempDir = await mkdtemp(join(tmpdir(), "unity-mcp-"));
        downloadDir = tempDir;
      } else {
        await mkdir(this.cacheRoot, { recursive: true });
        downloadDir = this.cacheRoot;
      }
      const localPath = join(downloadDir, fileName);

      try {
        if (CONFIG.DEBUG) {
          console.error(`[Unity MCP] Downloading ${url} to ${localPath}`);
        }
        await this.download(url, localPath, { timeoutMs: this.downloadTimeoutMs });
      } catch (error) {
        return this.result(
          "download_failed",
          `Error downloading asset: ${errorMessage(error)} (URL: ${url}, Target: ${targetPath})`,
          url,
          targetPath
        );
      }

      if (!(await exists(localPath))) {
        return this.result(
          "file_missing",
          `Error: download reported success but the file is missing: ${localPath} (URL: ${url}, Target: ${targetPath})`,
          url,
          targetPath
        );
      }

      const response = await this.unity.sendCommand("IMPORT_ASSET", {
        source_path: localPath,
        target_path: targetPath,
        overwrite,
      });

      if (getBoolean(response, "success") !== true) {
        return this.result(
          "import_failed",
          `Error importing remote asset: ${getString(response, "error") ?? "Unknown error"} (URL: ${url}, Target: ${targetPath})`,
          url,
          targetPath
        );
      }

      return this.result(
        "imported",
        getString(response, "message") ?? `Asset imported from ${url} to ${targetPath}`,
        url,
        targetPath
      );
    } catch (error) {
      return this.result(
        "unexpected_error",
        `Error importing remote asset: ${errorMessage(error)} (URL: ${url}, Target: ${targetPath})`,
        url,
        targetPath
      );
    } finally {
      if (tempDir) {
        await this.removeTempDir(tempDir);
      }
    }
  }

  /**
   * Import each URL into `targetFolder`, one at a time and in input order.
   * A failed item never stops the ones after it.
   */
  async batchImportRemoteAssets(
    urls: string[],
    targetFolder: string = DEFAULT_IMPORT_FOLDER,
    overwrite = false
  ): Promise<BatchItemResult[]> {
    const items: BatchItemResult[] = [];
    for (const [i, url] of urls.entries()) {
      const fileName = filenameFromUrl(url);
      const result = await this.importRemoteAsset({
        url,
        targetPath: `${targetFolder}/${fileName}`,
        overwrite,
        useTempStorage: true,
      });
      items.push({ index: i + 1, total: urls.length, fileName, result });
    }
    return items;
  }

  private async removeTempDir(dir: string): Promise<void> {
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (error) {
      this.onCleanupError(error, dir);
    }
  }

  private result(status: ImportStatus, message: string, sourceUrl: string, targetPath: string): ImportResult {
    return { status, message, sourceUrl, targetPath };
  }
}

export const EMPTY_BATCH_MESSAGE = "No URLs provided; nothing to import.";

export function formatImportResult(result: ImportResult): string {
  return result.message;
}

export function formatBatchResults(items: BatchItemResult[]): string {
  if (items.length === 0) return EMPTY_BATCH_MESSAGE;
  return items
    .map(({ index, total, fileName, result }) => `[${index}/${total}] ${fileName || result.sourceUrl}: ${formatImportResult(result)}`)
    .join("\n");
}
