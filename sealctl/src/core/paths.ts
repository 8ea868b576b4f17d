import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const HERE = path.dirname(fileURLToPath(import.meta.url));

/**
 * The bundled sealctl/config directory, whether running from sealctl/src
 * or from the compiled dist/sealctl/src.
 */
export const BUNDLED_CONFIG_DIR = [
  path.resolve(HERE, "../../config"),
  path.resolve(HERE, "../../../../sealctl/config"),
].find((dir) => fs.existsSync(dir)) ?? path.resolve(HERE, "../../config");

export function bundledFile(name: string): string {
  return path.join(BUNDLED_CONFIG_DIR, name);
}
