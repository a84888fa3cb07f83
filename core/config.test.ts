import { describe, expect, it } from "vitest";
import { describeConfig, maskSecret, parseConfig, resolveGitIdentity } from "./config";

describe("parseConfig", () => {
  it("applies defaults relative to the working directory", () => {
    const config = parseConfig({}, "/work");

    expect(config).toEqual({
      githubToken: undefined,
      githubApiUrl: "https://api.github.com",
      gitAuthorName: undefined,
      gitAuthorEmail: undefined,
      openaiApiKey: undefined,
      openaiModel: "gpt-4o",
      sandboxRoot: "/work/.orchestrator/sandboxes",
      runsRoot: "/work/.orchestrator/runs",
      defaultRepoUrl: undefined,
      logLevel: "info",
    });
  });

  it("treats blank secrets as unset and trims the rest", () => {
    const config = parseConfig({ GITHUB_TOKEN: "   ", OPENAI_API_KEY: " test-key " }, "/work");

    expect(config.githubToken).toBeUndefined();
    expect(config.openaiApiKey).toBe("test-key");
  });

  it("rejects an unknown log level", () => {
    expect(() => parseConfig({ LOG_LEVEL: "loud" }, "/work")).toThrow(
      /^Invalid environment configuration: LOG_LEVEL: /
    );
  });
});

describe("secrets and identity", () => {
  it("masks everything after the first four characters", () => {
    expect(maskSecret("test-token")).toBe("test****");
    expect(maskSecret("abc")).toBe("****");
  });

  it("never prints a raw token", () => {
    const config = parseConfig({ GITHUB_TOKEN: "test-token" }, "/work");

    expect(describeConfig(config).githubToken).toBe("test****");
  });

  it("prefers explicit identity over environment defaults", () => {
    const config = parseConfig(
      { GIT_AUTHOR_NAME: "Env Bot", GIT_AUTHOR_EMAIL: "env@example.test" },
      "/work"
    );

    expect(resolveGitIdentity(config, { name: "Cli Bot" })).toEqual({
      "user.name": "Cli Bot",
      "user.email": "env@example.test",
    });
    expect(resolveGitIdentity(parseConfig({}, "/work"))).toEqual({});
  });
});
