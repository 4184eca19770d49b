//crawlcore/config/env.ts

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

/**
 * Load the first .env found in the working directory or its parent into
 * process.env. Variables already set win over the file. Returns the path
 * loaded, or null when there was none.
 */
export function loadDotEnv(cwd: string = process.cwd()): string | null {
  const candidates = [path.resolve(cwd, ".env"), path.resolve(cwd, "..", ".env")];

  for (const p of candidates) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p });
      return p;
    }
  }

  return null;
}
