import { createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { randomUUID } from "node:crypto";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import axios from "axios";

export interface DownloadOptions {
  timeoutMs: number;
}

/** Fetches `url` and stores its body at `destination`, or rejects. */
export type Downloader = (url: string, destination: string, options: DownloadOptions) => Promise<void>;

function isTimeout(error: unknown): boolean {
  if (axios.isCancel(error)) return true;
  return axios.isAxiosError(error) && (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT");
}

/**
 * Stream a URL to disk. The body is written to a sibling `.part` file that is
 * renamed into place only after the whole transfer succeeded, so a failed
 * download never leaves a file at `destination`.
 */
export const downloadToFile: Downloader = async (url, destination, { timeoutMs }) => {
  await mkdir(dirname(destination), { recursive: true });
  const partPath = `${destination}.${randomUUID()}.part`;
  const deadline = AbortSignal.timeout(timeoutMs);

  try {
    const response = await axios.get<Readable>(url, {
      responseType: "stream",
      timeout: timeoutMs,
      signal: deadline,
      maxRedirects: 5,
    });
    await pipeline(response.data, createWriteStream(partPath));
    await rename(partPath, destination);
  } catch (error) {
    await rm(partPath, { force: true });
    if (deadline.aborted || isTimeout(error)) {
      throw new Error(`Download timed out after ${timeoutMs / 1000} seconds`);
    }
    throw error;
  }
};
