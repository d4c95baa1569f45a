import { createWriteStream } from "node:fs";
import { stat } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { Readable } from "node:stream";
import {
  DownloadTimeoutError,
  FileSystemError,
  InvalidSchemeError,
  NetworkError,
  err,
  formatError,
  isErrnoException,
  ok,
} from "@pyvm/core";
import type { PyvmError, Result } from "@pyvm/core";
import { createLogger } from "@pyvm/logger";
import type { DownloadOptions, DownloadResult } from "./types.js";

const log = createLogger("updater:downloader");

/** Buffer size for both sides of the pipe. */
export const DOWNLOAD_CHUNK_SIZE = 8 * 1024;

function hasHttpScheme(url: string): boolean {
  return url.startsWith("https://") || url.startsWith("http://");
}

function parseContentLength(header: string | null): number | null {
  if (!header) return null;
  const total = Number(header);
  return Number.isSafeInteger(total) && total > 0 ? total : null;
}

function classifyDownloadError(
  e: unknown,
  destPath: string,
  timeoutMs: number,
): PyvmError {
  if (e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError")) {
    return new DownloadTimeoutError(`Download timed out after ${timeoutMs / 1000}s`, { cause: e });
  }
  if (isErrnoException(e) && e.syscall !== undefined) {
    return new FileSystemError(`Could not write to file ${destPath}: ${e.message}`, destPath, {
      cause: e,
    });
  }
  return new NetworkError(`Download failed: ${formatError(e)}`, { cause: e });
}

/**
 * Stream a file from an http(s) URL to a local path with progress reporting.
 *
 * A size that differs from the advertised content-length is logged and
 * flagged in the result but does not fail the download. Never throws.
 */
export async function downloadFile(
  url: string,
  destPath: string,
  options: DownloadOptions,
): Promise<Result<DownloadResult>> {
  if (!hasHttpScheme(url)) {
    return err(new InvalidSchemeError(url));
  }

  log.info(`Downloading ${url} to ${destPath}`);
  let total: number | null = null;

  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(options.timeoutMs),
      redirect: "follow",
    });

    if (!response.ok) {
      return err(new NetworkError(`Download failed: HTTP ${response.status} ${response.statusText}`));
    }
    if (!response.body) {
      return err(new NetworkError("Download failed: no response body"));
    }

    total = parseContentLength(response.headers.get("content-length"));
    let downloaded = 0;

    const reader = response.body.getReader();
    const source = new Readable({
      highWaterMark: DOWNLOAD_CHUNK_SIZE,
      async read() {
        try {
          const { done, value } = await reader.read();
          if (done) {
            this.push(null);
            return;
          }
          downloaded += value.byteLength;
          options.onProgress?.({
            downloaded,
            total,
            percent: total === null ? null : Math.min(100, (downloaded / total) * 100),
          });
          this.push(Buffer.from(value));
        } catch (e) {
          this.destroy(e instanceof Error ? e : new Error(String(e)));
        }
      },
    });

    await pipeline(source, createWriteStream(destPath, { highWaterMark: DOWNLOAD_CHUNK_SIZE }));
  } catch (e) {
    return err(classifyDownloadError(e, destPath, options.timeoutMs));
  }

  let bytesWritten: number;
  try {
    bytesWritten = (await stat(destPath)).size;
  } catch (e) {
    return err(new FileSystemError("Downloaded file not found", destPath, { cause: e }));
  }

  const sizeMismatch = total !== null && bytesWritten !== total;
  if (sizeMismatch) {
    log.warn(`Downloaded file size (${bytesWritten}) doesn't match expected size (${total})`);
  }

  return ok({ filePath: destPath, bytesWritten, sizeMismatch });
}
