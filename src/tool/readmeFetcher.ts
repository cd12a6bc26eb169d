/**
 * README fetcher for GitHub-hosted servers
 *
 * Supported urls:
 * - https://github.com/<owner>/<repo>
 * - https://github.com/<owner>/<repo>/tree/<ref>/<path>
 *
 * Candidates are tried in order on raw.githubusercontent.com; the first one
 * that answers wins. Anything else (non-GitHub url, no README, network error)
 * yields null.
 */

import type { HttpRequestFn } from "@/types";
import { httpRequest as defaultHttpRequest, isNotFound } from "@/clients/http";
import { RAW_GITHUB_BASE, README_FILENAMES, README_TIMEOUT_MS } from "@/constants";
import * as logger from "@/logger";

export interface GithubLocation {
  owner: string;
  repo: string;
  /** "HEAD" for bare repository urls */
  ref: string;
  /** Directory inside the repository, "" for the root */
  path: string;
}

/**
 * Parse a GitHub repository or tree url
 *
 * @example
 * parseGithubUrl("https://github.com/org/repo/tree/main/src/fetch")
 * // { owner: "org", repo: "repo", ref: "main", path: "src/fetch" }
 */
export function parseGithubUrl(url: string): GithubLocation | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (parsed.hostname !== "github.com" && parsed.hostname !== "www.github.com") {
    return null;
  }

  const segments = parsed.pathname.split("/").filter((segment) => segment.length > 0);
  if (segments.length < 2) {
    return null;
  }

  const owner = segments[0];
  const repo = segments[1].replace(/\.git$/, "");
  if (segments[2] === "tree" && segments.length >= 4) {
    return { owner, repo, ref: segments[3], path: segments.slice(4).join("/") };
  }
  return { owner, repo, ref: "HEAD", path: "" };
}

/**
 * Raw README candidate urls for a location, in lookup order
 */
export function readmeCandidates(location: GithubLocation): string[] {
  const prefix = [RAW_GITHUB_BASE, location.owner, location.repo, location.ref, location.path]
    .filter((part) => part.length > 0)
    .join("/");
  return README_FILENAMES.map((file) => `${prefix}/${file}`);
}

export type ReadmeFetcher = (url: string) => Promise<string | null>;

/**
 * Build a README fetcher over the given HTTP function
 */
export function createReadmeFetcher(request: HttpRequestFn = defaultHttpRequest): ReadmeFetcher {
  return async (url: string) => {
    const location = parseGithubUrl(url);
    if (!location) {
      logger.debug("README lookup skipped: not a GitHub repository url", { url });
      return null;
    }

    for (const candidate of readmeCandidates(location)) {
      try {
        const content = await request<string>({
          method: "GET",
          url: candidate,
          responseType: "text",
          timeoutMs: README_TIMEOUT_MS,
          retry: { maxAttempts: 1 },
        });
        if (typeof content === "string" && content.trim().length > 0) {
          return content;
        }
      } catch (error) {
        if (!isNotFound(error)) {
          logger.warn("README request failed", {
            url: candidate,
            error: logger.errorMessage(error),
          });
        }
      }
    }

    logger.debug("No README found", { url });
    return null;
  };
}
