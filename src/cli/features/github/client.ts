/**
 * GitHub REST client for the upstream neovim/neovim repository
 */

import Ajv from "ajv";

import { NetworkError, RateLimitError, errorMessage } from "@/cli/errors.js";
import { debug } from "@/cli/logger.js";

import type { UpstreamRelease } from "@/cli/features/version/types.js";
import type { ValidateFunction } from "ajv";

export const GITHUB_API = "https://api.github.com";
export const UPSTREAM_REPO = "neovim/neovim";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type RepoCommit = {
  sha: string;
  commit: {
    author: { name: string };
    message: string;
  };
};

export type RemoteTag = {
  name: string;
};

export type DownloadResult =
  | { type: "ok"; data: Buffer }
  | { type: "not-found" };

type ApiErrorBody = {
  message: string;
  documentation_url?: string;
};

const releaseSchema = {
  type: "object",
  properties: {
    tag_name: { type: "string" },
    target_commitish: { type: ["string", "null"] },
    published_at: { type: "string" },
  },
  required: ["tag_name", "published_at"],
};

const commitSchema = {
  type: "object",
  properties: {
    sha: { type: "string" },
    commit: {
      type: "object",
      properties: {
        author: {
          type: "object",
          properties: { name: { type: "string" } },
          required: ["name"],
        },
        message: { type: "string" },
      },
      required: ["author", "message"],
    },
  },
  required: ["sha", "commit"],
};

// Responses are validated but never trimmed: bob.json keeps every upstream field
const ajv = new Ajv({ allErrors: true });

const validateRelease = ajv.compile<UpstreamRelease>(releaseSchema);
const validateReleaseList = ajv.compile<Array<UpstreamRelease>>({
  type: "array",
  items: releaseSchema,
});
const validateCommit = ajv.compile<RepoCommit>(commitSchema);
const validateCommitList = ajv.compile<Array<RepoCommit>>({
  type: "array",
  items: commitSchema,
});
const validateTagList = ajv.compile<Array<RemoteTag>>({
  type: "array",
  items: {
    type: "object",
    properties: { name: { type: "string" } },
    required: ["name"],
  },
});
const validateApiError = ajv.compile<ApiErrorBody>({
  type: "object",
  properties: {
    message: { type: "string" },
    documentation_url: { type: "string" },
  },
  required: ["message"],
});

/**
 * Thin wrapper over fetch that speaks the GitHub v3 API
 */
export class GitHubClient {
  private readonly fetchFn: FetchFn;
  private readonly token: string | null;

  constructor(args?: { fetchFn?: FetchFn | null; token?: string | null }) {
    this.fetchFn = args?.fetchFn ?? fetch;
    this.token = args?.token ?? null;
  }

  /**
   * @param args - Client arguments
   * @param args.env - Environment to read GITHUB_TOKEN from
   *
   * @returns A client using the global fetch
   */
  static fromEnv(args: { env: NodeJS.ProcessEnv }): GitHubClient {
    const token = args.env.GITHUB_TOKEN;
    return new GitHubClient({
      token: token != null && token !== "" ? token : null,
    });
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": "bob",
      Accept: "application/vnd.github.v3+json",
    };
    if (this.token != null) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  private async send(url: string, headers: Record<string, string>): Promise<Response> {
    debug({ message: `GET ${url}` });
    try {
      return await this.fetchFn(url, { headers });
    } catch (err) {
      throw new NetworkError(`Request to ${url} failed: ${errorMessage(err)}`, err);
    }
  }

  private async requestJson<T>(args: {
    path: string;
    validate: ValidateFunction<T>;
  }): Promise<T> {
    const { path, validate } = args;
    const url = `${GITHUB_API}${path}`;
    const response = await this.send(url, this.headers());
    const text = await response.text();

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new NetworkError(
        `Unexpected response from ${url} (HTTP ${response.status})`,
      );
    }

    if (validateApiError(body)) {
      if (body.documentation_url?.includes("rate-limiting") === true) {
        throw new RateLimitError();
      }
      throw new NetworkError(`GitHub API error: ${body.message}`);
    }

    if (!response.ok) {
      throw new NetworkError(`Request to ${url} failed with HTTP ${response.status}`);
    }

    if (!validate(body)) {
      throw new NetworkError(`Unexpected response shape from ${url}`);
    }

    return body;
  }

  /**
   * @returns The upstream nightly release
   */
  async getUpstreamNightly(): Promise<UpstreamRelease> {
    return this.requestJson({
      path: `/repos/${UPSTREAM_REPO}/releases/tags/nightly`,
      validate: validateRelease,
    });
  }

  /**
   * The newest release is sometimes a nightly still being published,
   * so the stable release is the second one
   *
   * @returns The latest stable release
   */
  async getUpstreamStable(): Promise<UpstreamRelease> {
    const releases = await this.requestJson({
      path: `/repos/${UPSTREAM_REPO}/releases?per_page=2`,
      validate: validateReleaseList,
    });
    const stable = releases.at(1);
    if (stable == null) {
      throw new NetworkError("Could not find the latest stable release");
    }
    return stable;
  }

  /**
   * @param args - Query arguments
   * @param args.since - ISO timestamp of the older nightly
   * @param args.until - ISO timestamp of the newer nightly
   *
   * @returns Commits on master between the two timestamps
   */
  async getCommitsBetween(args: {
    since: string;
    until: string;
  }): Promise<Array<RepoCommit>> {
    const since = encodeURIComponent(args.since);
    const until = encodeURIComponent(args.until);
    return this.requestJson({
      path: `/repos/${UPSTREAM_REPO}/commits?since=${since}&until=${until}&per_page=100`,
      validate: validateCommitList,
    });
  }

  /**
   * @returns Full sha of the newest commit on master
   */
  async getLatestCommit(): Promise<string> {
    const commit = await this.requestJson({
      path: `/repos/${UPSTREAM_REPO}/commits/master`,
      validate: validateCommit,
    });
    return commit.sha;
  }

  /**
   * @returns The 50 most recent upstream tags
   */
  async listTags(): Promise<Array<RemoteTag>> {
    return this.requestJson({
      path: `/repos/${UPSTREAM_REPO}/tags?per_page=50`,
      validate: validateTagList,
    });
  }

  /**
   * Download a release asset into memory
   * @param args - Download arguments
   * @param args.url - Absolute asset URL
   *
   * @returns The bytes, or not-found on HTTP 404
   */
  async download(args: { url: string }): Promise<DownloadResult> {
    const { url } = args;
    const response = await this.send(url, { "User-Agent": "bob" });

    if (response.status === 404) {
      return { type: "not-found" };
    }
    if (!response.ok) {
      throw new NetworkError(`Download of ${url} failed with HTTP ${response.status}`);
    }

    try {
      return { type: "ok", data: Buffer.from(await response.arrayBuffer()) };
    } catch (err) {
      throw new NetworkError(`Download of ${url} failed: ${errorMessage(err)}`, err);
    }
  }
}
