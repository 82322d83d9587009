import { Octokit } from "@octokit/rest";

import type {
  AuthenticatedUser,
  HostingClient,
  PagesSource,
  RepoProbe,
} from "../app/deploy/ports.js";
import type { HostingConfig } from "../core/config.js";
import { HostingError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type GithubHostingOptions = {
  token: string;
  hosting: Pick<HostingConfig, "api_base_url" | "request_timeout_ms">;
  /** Replaces the global fetch; tests use it to answer requests in-process. */
  fetch?: typeof fetch;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createGithubHostingClient(options: GithubHostingOptions): HostingClient {
  const octokit = new Octokit({
    auth: options.token,
    baseUrl: options.hosting.api_base_url,
    userAgent: "folio-pages",
    request: options.fetch ? { fetch: options.fetch } : {},
    // Failed requests are rethrown as HostingError and rendered by the CLI.
    log: { debug: noop, info: noop, warn: console.warn, error: noop },
  });
  const timeoutMs = options.hosting.request_timeout_ms;
  const request = (): { signal: AbortSignal } => ({ signal: AbortSignal.timeout(timeoutMs) });

  return {
    async getAuthenticatedUser(): Promise<AuthenticatedUser> {
      try {
        const res = await octokit.rest.users.getAuthenticated({ request: request() });
        return { login: res.data.login };
      } catch (err) {
        throw toHostingError("GET /user", err);
      }
    },

    async probeRepository(owner: string, repo: string): Promise<RepoProbe> {
      try {
        await octokit.rest.repos.get({ owner, repo, request: request() });
        return { exists: true };
      } catch (err) {
        if (readStatus(err) === 404) return { exists: false };
        throw toHostingError(`GET /repos/${owner}/${repo}`, err);
      }
    },

    async createRepository(name: string): Promise<void> {
      try {
        await octokit.rest.repos.createForAuthenticatedUser({
          name,
          private: false,
          request: request(),
        });
      } catch (err) {
        throw toHostingError("POST /user/repos", err);
      }
    },

    async enablePages(owner: string, repo: string, source: PagesSource): Promise<void> {
      try {
        await octokit.rest.repos.createPagesSite({
          owner,
          repo,
          source: { branch: source.branch, path: source.path },
          request: request(),
        });
      } catch (err) {
        throw toHostingError(`POST /repos/${owner}/${repo}/pages`, err);
      }
    },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function toHostingError(route: string, err: unknown): HostingError {
  const status = readStatus(err);
  const suffix = status === undefined ? "" : ` (HTTP ${status})`;
  return new HostingError(`${route} failed${suffix}: ${formatErrorMessage(err)}`, status, err);
}

function noop(): void {
  return;
}

// Octokit's RequestError carries the HTTP status.
function readStatus(err: unknown): number | undefined {
  if (!err || typeof err !== "object" || !("status" in err)) return undefined;
  const status = err.status;
  return typeof status === "number" ? status : undefined;
}
