import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { findProjectRoot, loadDotEnvIfPresent } from "./load_dotenv";

describe("findProjectRoot", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "talkback-env-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("walks up to the workspace package.json", () => {
    writeFileSync(join(root, "package.json"), JSON.stringify({ workspaces: ["packages/*"] }));
    const nested = join(root, "packages", "client");
    mkdirSync(nested, { recursive: true });
    writeFileSync(join(nested, "package.json"), JSON.stringify({ name: "@talkback/client" }));

    expect(findProjectRoot(nested)).toBe(root);
  });

  it("stops at the nearest .env", () => {
    const nested = join(root, "app");
    mkdirSync(nested);
    writeFileSync(join(nested, ".env"), "");

    expect(findProjectRoot(nested)).toBe(nested);
  });
});

describe("loadDotEnvIfPresent", () => {
  const keys = ["TALKBACK_TEST_FROM_FILE", "TALKBACK_TEST_PRESET", "TALKBACK_TEST_LOCAL"];
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "talkback-env-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    for (const key of keys) delete process.env[key];
  });

  it("reads .env and .env.local without overriding existing values", () => {
    writeFileSync(
      join(root, ".env"),
      "TALKBACK_TEST_FROM_FILE=file\nTALKBACK_TEST_PRESET=file\nTALKBACK_TEST_LOCAL=base\n",
    );
    writeFileSync(join(root, ".env.local"), "TALKBACK_TEST_LOCAL=local\n");
    process.env.TALKBACK_TEST_PRESET = "shell";

    loadDotEnvIfPresent(root);

    expect(process.env.TALKBACK_TEST_FROM_FILE).toBe("file");
    expect(process.env.TALKBACK_TEST_PRESET).toBe("shell");
    expect(process.env.TALKBACK_TEST_LOCAL).toBe("local");
  });
});
