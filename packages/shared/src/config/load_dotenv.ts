import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { config as dotenvConfig } from "dotenv";
import { createLogger } from "../logging";

const log = createLogger({ component: "config" });

/**
 * Find the project root by searching up for a directory containing .env or package.json with workspaces.
 */
export function findProjectRoot(startDir: string): string {
  let dir = startDir;

  for (;;) {
    if (existsSync(resolve(dir, ".env"))) {
      return dir;
    }
    const pkgPath = resolve(dir, "package.json");
    if (existsSync(pkgPath)) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
        if (pkg && typeof pkg === "object" && "workspaces" in pkg) {
          return dir;
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.debug({ pkgPath, err: message }, "Skipping unreadable package.json");
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return startDir;
    dir = parent;
  }
}

/**
 * Load .env.local, then .env, from the project root.
 * Nothing is overridden, so the shell beats .env.local, which beats .env.
 */
export function loadDotEnvIfPresent(cwd: string = process.cwd()): void {
  const projectRoot = findProjectRoot(cwd);
  for (const filename of [".env.local", ".env"]) {
    const fullPath = resolve(projectRoot, filename);
    if (!existsSync(fullPath)) continue;
    const result = dotenvConfig({ path: fullPath, override: false });
    if (result.error) {
      log.warn({ filename, err: result.error.message }, "Failed to read env file");
    }
  }
}
