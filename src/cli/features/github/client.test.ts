/**
 * Tests for the GitHub client
 */

import { describe, it, expect } from "vitest";

import { NetworkError, RateLimitError } from "@/cli/errors.js";
import { GitHubClient } from "@/cli/features/github/client.js";

import type { FetchFn } from "@/cli/features/github/client.js";

const recordingFetch = (
  respond: () => Response,
): { fetchFn: FetchFn; calls: Array<{ url: string; headers: RequestInit["headers"] }> } => {
  const calls: Array<{ url: string; headers: RequestInit["headers"] }> = [];
  return {
    calls,
    fetchFn: async (url, init) => {
      calls.push({ url, headers: init?.headers });
      return respond();
    },
  };
};

describe("GitHubClient", () => {
  it("should send a bearer token when configured", async () => {
    const { fetchFn, calls } = recordingFetch(
      () => new Response(JSON.stringify({ tag_name: "nightly", published_at: "2024-01-01T00:00:00Z" })),
    );
    const client = new GitHubClient({ fetchFn, token: "test-secret" });

    const release = await client.getUpstreamNightly();

    expect(release.tag_name).toBe("nightly");
    expect(calls).toEqual([
      {
        url: "https://api.github.com/repos/neovim/neovim/releases/tags/nightly",
        headers: {
          "User-Agent": "bob",
          Accept: "application/vnd.github.v3+json",
          Authorization: "Bearer test-secret",
        },
      },
    ]);
  });

  it("should read the token from the environment", () => {
    expect(GitHubClient.fromEnv({ env: { GITHUB_TOKEN: "" } })).toEqual(new GitHubClient());
  });

  it("should turn rate limit responses into RateLimitError", async () => {
    const { fetchFn } = recordingFetch(
      () =>
        new Response(
          JSON.stringify({
            message: "API rate limit exceeded",
            documentation_url: "https://docs.github.com/rest/overview/rate-limiting",
          }),
          { status: 403 },
        ),
    );
    const client = new GitHubClient({ fetchFn });

    await expect(client.getUpstreamNightly()).rejects.toBeInstanceOf(RateLimitError);
  });

  it("should report other API errors", async () => {
    const { fetchFn } = recordingFetch(
      () => new Response(JSON.stringify({ message: "Not Found" }), { status: 404 }),
    );
    const client = new GitHubClient({ fetchFn });

    await expect(client.getLatestCommit()).rejects.toThrow("GitHub API error: Not Found");
  });

  it("should reject responses of the wrong shape", async () => {
    const { fetchFn } = recordingFetch(() => new Response(JSON.stringify([{ nope: 1 }])));
    const client = new GitHubClient({ fetchFn });

    await expect(client.listTags()).rejects.toBeInstanceOf(NetworkError);
  });

  it("should take the second release as stable", async () => {
    const { fetchFn } = recordingFetch(
      () =>
        new Response(
          JSON.stringify([
            { tag_name: "nightly", published_at: "2024-01-02T00:00:00Z" },
            { tag_name: "v0.10.0", published_at: "2024-01-01T00:00:00Z" },
          ]),
        ),
    );
    const client = new GitHubClient({ fetchFn });

    expect((await client.getUpstreamStable()).tag_name).toBe("v0.10.0");
  });

  it("should report missing downloads as not-found", async () => {
    const { fetchFn, calls } = recordingFetch(() => new Response("", { status: 404 }));
    const client = new GitHubClient({ fetchFn, token: "test-secret" });

    const result = await client.download({ url: "https://github.com/x/y.tar.gz" });

    expect(result).toEqual({ type: "not-found" });
    expect(calls[0].headers).toEqual({ "User-Agent": "bob" });
  });

  it("should wrap transport failures", async () => {
    const client = new GitHubClient({
      fetchFn: async () => {
        throw new Error("connection refused");
      },
    });

    await expect(client.download({ url: "https://github.com/x" })).rejects.toThrow(
      "Request to https://github.com/x failed: connection refused",
    );
  });
});
