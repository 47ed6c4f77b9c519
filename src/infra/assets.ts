import path from "node:path";
import { fileURLToPath } from "node:url";

// Both src/infra/ and dist/infra/ sit two levels below the package root.
const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

export function resolveAssetPath(...segments: string[]): string {
  return path.join(packageRoot, "assets", ...segments);
}
