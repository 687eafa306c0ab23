import { existsSync } from "fs";
import { dirname, join, parse } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));

let cachedRoot: string | null = null;

/**
 * Walks up from this module to the directory holding package.json.
 * Works from both the source tree and the compiled output.
 */
export function findPackageRoot(): string {
  if (cachedRoot) {
    return cachedRoot;
  }

  let currentDir = __dirname;
  const root = parse(currentDir).root;

  while (currentDir !== root) {
    if (existsSync(join(currentDir, "package.json"))) {
      cachedRoot = currentDir;
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  throw new Error(`Could not find package root above ${__dirname}`);
}
