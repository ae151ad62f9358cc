import { existsSync } from "fs";
import { dirname, resolve } from "path";

/**
 * Find the nearest directory at/above startDir that contains `marker`.
 * Lets both src/ (under tsx) and dist/ locate config/ beside package.json.
 */
export function findPackageRoot(
  startDir: string,
  marker: string = "package.json",
  maxDepth: number = 10,
): string {
  let dir = resolve(startDir);
  for (let depth = 0; depth < maxDepth; depth++) {
    if (existsSync(resolve(dir, marker))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return resolve(startDir);
}
