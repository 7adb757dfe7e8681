import fs from "node:fs";

// Resolves both from src/ under the test runner and from dist/src/ after a build.
const DATA_DIR_CANDIDATES = ["../data/", "../../data/"];

export function resolveDataFile(name: string): URL {
  for (const candidate of DATA_DIR_CANDIDATES) {
    const url = new URL(`${candidate}${name}`, import.meta.url);
    if (fs.existsSync(url)) {
      return url;
    }
  }
  throw new Error(`data file not found: ${name}`);
}

export function readJsonDataFile(name: string): unknown {
  return JSON.parse(fs.readFileSync(resolveDataFile(name), "utf8"));
}
