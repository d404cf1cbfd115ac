import fs from "node:fs";
import path from "node:path";

export class JsonFileError extends Error {
  constructor(
    message: string,
    public readonly pathname: string,
  ) {
    super(message);
    this.name = "JsonFileError";
  }
}

/**
 * Read and shape-check a JSON file. Returns undefined when the file does not
 * exist; a file that exists but is unreadable or has the wrong shape throws.
 */
export function readJsonFile<T>(
  pathname: string,
  guard: (value: unknown) => value is T,
): T | undefined {
  if (!fs.existsSync(pathname)) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(pathname, "utf8"));
  } catch (e) {
    throw new JsonFileError(
      `Corrupt JSON in ${pathname}: ${e instanceof Error ? e.message : String(e)}`,
      pathname,
    );
  }

  if (!guard(parsed)) {
    throw new JsonFileError(`Unexpected content in ${pathname}`, pathname);
  }
  return parsed;
}

export function writeJsonFileAtomic(pathname: string, data: unknown): void {
  const dir = path.dirname(pathname);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  // Temp file + rename so readers never observe a half-written state
  const tmp = `${pathname}.tmp.${process.pid}`;
  fs.writeFileSync(tmp, `${JSON.stringify(data, null, 2)}\n`, { encoding: "utf8", mode: 0o600 });
  fs.renameSync(tmp, pathname);
}
