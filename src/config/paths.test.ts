import { describe, it, expect } from "vitest";
import path from "node:path";
import os from "node:os";
import {
  resolveStateDir,
  resolveConfigPath,
  resolveDataDir,
  resolveStoreFilePath,
  resolveUserPath,
} from "./paths.js";

describe("resolveStateDir", () => {
  it("defaults to ~/.calldesk", () => {
    const env: NodeJS.ProcessEnv = {};
    expect(resolveStateDir(env)).toBe(path.join(os.homedir(), ".calldesk"));
  });

  it("respects CALLDESK_STATE_DIR override", () => {
    const env: NodeJS.ProcessEnv = { CALLDESK_STATE_DIR: "/tmp/test-state" };
    expect(resolveStateDir(env)).toBe(path.resolve("/tmp/test-state"));
  });

  it("expands ~ in CALLDESK_STATE_DIR", () => {
    const env: NodeJS.ProcessEnv = { CALLDESK_STATE_DIR: "~/custom-state" };
    expect(resolveStateDir(env)).toBe(path.join(os.homedir(), "custom-state"));
  });

  it("respects CALLDESK_HOME for the default location", () => {
    const env: NodeJS.ProcessEnv = { CALLDESK_HOME: "/custom/home" };
    expect(resolveStateDir(env)).toBe(path.join("/custom/home", ".calldesk"));
  });
});

describe("resolveConfigPath", () => {
  it("defaults to stateDir/calldesk.json", () => {
    const env: NodeJS.ProcessEnv = {};
    expect(resolveConfigPath(env)).toBe(
      path.join(os.homedir(), ".calldesk", "calldesk.json"),
    );
  });

  it("respects CALLDESK_CONFIG_PATH override", () => {
    const env: NodeJS.ProcessEnv = { CALLDESK_CONFIG_PATH: "/etc/calldesk.json" };
    expect(resolveConfigPath(env)).toBe(path.resolve("/etc/calldesk.json"));
  });

  it("uses a custom state dir when given", () => {
    expect(resolveConfigPath({}, "/srv/state")).toBe(
      path.join("/srv/state", "calldesk.json"),
    );
  });
});

describe("resolveDataDir", () => {
  it("returns stateDir/data", () => {
    expect(resolveDataDir("/srv/state")).toBe(path.join("/srv/state", "data"));
  });
});

describe("resolveStoreFilePath", () => {
  it("defaults to <state>/data/shared_information.json", () => {
    const env: NodeJS.ProcessEnv = { CALLDESK_STATE_DIR: "/srv/state" };
    expect(resolveStoreFilePath(undefined, env)).toBe(
      path.join(path.resolve("/srv/state"), "data", "shared_information.json"),
    );
  });

  it("uses the configured path, expanding ~", () => {
    const env: NodeJS.ProcessEnv = { CALLDESK_HOME: "/home/agent" };
    expect(resolveStoreFilePath("~/calls.json", env)).toBe(
      path.join("/home/agent", "calls.json"),
    );
  });

  it("ignores a blank configured path", () => {
    const env: NodeJS.ProcessEnv = { CALLDESK_STATE_DIR: "/srv/state" };
    expect(resolveStoreFilePath("   ", env)).toBe(
      path.join(path.resolve("/srv/state"), "data", "shared_information.json"),
    );
  });
});

describe("resolveUserPath", () => {
  it("returns empty input unchanged", () => {
    expect(resolveUserPath("  ")).toBe("");
  });

  it("expands a bare ~", () => {
    expect(resolveUserPath("~", { CALLDESK_HOME: "/home/agent" })).toBe("/home/agent");
  });
});
