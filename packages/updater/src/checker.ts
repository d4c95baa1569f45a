import { setTimeout as delay } from "node:timers/promises";
import { load } from "cheerio";
import {
  FetchFailedError,
  NetworkError,
  PyvmError,
  ValidationError,
  err,
  formatError,
  ok,
} from "@pyvm/core";
import type { PyvmConfig, Result } from "@pyvm/core";
import { createLogger } from "@pyvm/logger";
import type { LatestRelease, VersionReport } from "./types.js";
import { isNewerVersion, validateVersionString } from "./version.js";

const log = createLogger("updater:checker");

/** The download button on python.org/downloads/ */
export const DOWNLOAD_BUTTON_SELECTOR = "a.button";

export type Sleep = (ms: number) => Promise<unknown>;

/**
 * Make a download link absolute. python.org serves site-relative hrefs
 * such as "/ftp/python/3.12.1/python-3.12.1-amd64.exe".
 */
export function resolveDownloadUrl(href: string | undefined, origin: string): string | null {
  if (!href) return null;
  if (href.startsWith("http")) return href;
  return `${origin}${href}`;
}

/**
 * Extract the latest version and its download link from the downloads page.
 * The button reads e.g. "Download Python 3.12.1"; the version is its last word.
 */
export function parseDownloadsPage(html: string, origin: string): LatestRelease {
  const $ = load(html);
  const button = $(DOWNLOAD_BUTTON_SELECTOR).first();
  if (button.length === 0) {
    throw new FetchFailedError("Could not find download button on python.org");
  }

  const version = button.text().trim().split(/\s+/).at(-1) ?? "";
  if (!validateVersionString(version)) {
    throw new ValidationError(`Invalid version format retrieved: ${version}`);
  }

  return { version, downloadUrl: resolveDownloadUrl(button.attr("href"), origin) };
}

/**
 * Fetch python.org's downloads page once and read the latest release.
 * Times out after `config.requestTimeoutMs`. Throws on any failure.
 */
export async function fetchLatestRelease(config: PyvmConfig): Promise<LatestRelease> {
  const url = config.downloadsPageUrl;
  log.debug(`Fetching downloads page from ${url}`);

  let response: Response;
  try {
    response = await fetch(url, {
      signal: AbortSignal.timeout(config.requestTimeoutMs),
    });
  } catch (e) {
    if (e instanceof Error && e.name === "TimeoutError") {
      throw new NetworkError(`Request to ${url} timed out`, { cause: e });
    }
    throw new NetworkError(`Network request failed: ${formatError(e)}`, { cause: e });
  }

  if (!response.ok) {
    throw new NetworkError(
      `Failed to fetch downloads page: HTTP ${response.status} ${response.statusText}`,
    );
  }

  return parseDownloadsPage(await response.text(), config.siteOrigin);
}

/**
 * Fetch the latest release, retrying up to `config.maxRetries` times with a
 * linear backoff of `retryDelayMs * attempt`. Never throws.
 */
export async function fetchLatestReleaseWithRetry(
  config: PyvmConfig,
  sleep: Sleep = delay,
): Promise<Result<LatestRelease>> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxRetries; attempt++) {
    try {
      return ok(await fetchLatestRelease(config));
    } catch (e) {
      lastError = e;
      log.warn(`Attempt ${attempt} of ${config.maxRetries} failed: ${formatError(e)}`);
      if (attempt < config.maxRetries) {
        await sleep(config.retryDelayMs * attempt);
      }
    }
  }

  return err(
    new FetchFailedError(
      `Could not fetch the latest Python release after ${config.maxRetries} attempts: ${formatError(lastError)}`,
      { cause: lastError },
    ),
  );
}

/**
 * Compare the local interpreter against the latest python.org release.
 * A missing interpreter always needs an update. Never throws.
 */
export async function checkPythonVersion(
  localVersion: string | null,
  config: PyvmConfig,
  sleep?: Sleep,
): Promise<Result<VersionReport>> {
  const latest = await fetchLatestReleaseWithRetry(config, sleep);
  if (!latest.ok) return latest;

  const { version: latestVersion, downloadUrl } = latest.value;
  try {
    const needsUpdate = localVersion === null || isNewerVersion(localVersion, latestVersion);
    log.info(
      needsUpdate
        ? `Update available: ${localVersion ?? "none"} -> ${latestVersion}`
        : `Already up to date (${latestVersion})`,
    );
    return ok({ localVersion, latestVersion, downloadUrl, needsUpdate });
  } catch (e) {
    if (e instanceof PyvmError) return err(e);
    return err(new ValidationError(`Error comparing versions: ${formatError(e)}`, { cause: e }));
  }
}
