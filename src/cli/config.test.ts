import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "../errors";
import { getTargetConfig, parseCliConfig, resolveConfigPath } from "./config";

describe("parseCliConfig", () => {
  it("fills in defaults and stringifies transaction numbers", () => {
    const config = parseCliConfig(
      { targets: { prod: { url: "https://cms.example.test/fmax/", transactionNumber: 12345 } } },
      "test"
    );

    expect(config).toEqual({
      mapFilename: ".gitdocmap.json",
      targets: { prod: { url: "https://cms.example.test/fmax/", transactionNumber: "12345" } }
    });
  });

  it("names the invalid keys", () => {
    expect(() => parseCliConfig({ targets: { prod: { url: "not a url", transactionNumber: "1" } } }, "rc")).toThrow(
      new ConfigError("Invalid configuration in rc: targets.prod.url: Invalid url")
    );
  });

  it("requires at least one target", () => {
    expect(() => parseCliConfig({ targets: {} }, "rc")).toThrow(
      "Invalid configuration in rc: targets: at least one target is required"
    );
  });
});

describe("resolveConfigPath", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("prefers the explicit path, then the environment, then the top-level file", () => {
    vi.stubEnv("GIT_DOC_MAPPER_CONFIG", "/etc/git-doc-mapper.json");

    expect(resolveConfigPath("/tmp/rc.json", "/work/repo")).toBe(path.resolve("/tmp/rc.json"));
    expect(resolveConfigPath(undefined, "/work/repo")).toBe(path.resolve("/etc/git-doc-mapper.json"));

    vi.stubEnv("GIT_DOC_MAPPER_CONFIG", "");
    expect(resolveConfigPath(undefined, "/work/repo")).toBe(path.join("/work/repo", ".gitdocrc.json"));
  });
});

describe("getTargetConfig", () => {
  const config = parseCliConfig({ targets: { dev: { url: "https://dev.example.test/", transactionNumber: "1" } } }, "rc");

  it("returns a configured target", () => {
    expect(getTargetConfig(config, "dev")).toEqual({ url: "https://dev.example.test/", transactionNumber: "1" });
  });

  it("does not treat object members as targets", () => {
    expect(() => getTargetConfig(config, "toString")).toThrow("Unknown target [toString]; configured targets: dev");
  });
});
