import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";

export async function readNdjsonFile<T>(
  filePath: string,
  mapper: (value: unknown) => T | null,
): Promise<T[]> {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  const stream = fs.createReadStream(filePath, "utf8");
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  const entries: T[] = [];
  for await (const line of rl) {
    if (!line.trim()) {
      continue;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      continue;
    }
    const mapped = mapper(parsed);
    if (mapped) {
      entries.push(mapped);
    }
  }
  return entries;
}

async function ensureDir(filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
}

export async function appendNdjsonAtomic(filePath: string, lines: string[]): Promise<void> {
  if (lines.length === 0) {
    return;
  }
  await ensureDir(filePath);
  const existing = fs.existsSync(filePath) ? await fs.promises.readFile(filePath, "utf8") : "";
  const payload = `${existing}${lines.join("\n")}\n`;
  const tmpPath = `${filePath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2)}`;
  await fs.promises.writeFile(tmpPath, payload, "utf8");
  try {
    await fs.promises.rename(tmpPath, filePath);
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true });
    throw err;
  }
}

export async function appendNdjson(filePath: string, records: unknown[]): Promise<void> {
  await appendNdjsonAtomic(
    filePath,
    records.map((record) => JSON.stringify(record)),
  );
}
