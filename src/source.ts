import { open, readdir, type FileHandle } from "node:fs/promises";
import path from "node:path";

export const SOURCE_EXTENSION = ".o2";

export type FileErrorKind = "UnableToOpen" | "UnableToRead";

export class FileError extends Error {
  readonly kind: FileErrorKind;
  readonly file: string;

  constructor(kind: FileErrorKind, file: string, options?: { cause?: unknown }) {
    super(kind === "UnableToOpen" ? `unable to open file '${file}'` : `unable to read file '${file}'`, options);
    this.name = "FileError";
    this.kind = kind;
    this.file = file;
  }
}

export async function readSource(file: string): Promise<string> {
  let handle: FileHandle;
  try {
    handle = await open(file, "r");
  } catch (e) {
    throw new FileError("UnableToOpen", file, { cause: e });
  }

  try {
    return await handle.readFile("utf-8");
  } catch (e) {
    throw new FileError("UnableToRead", file, { cause: e });
  } finally {
    await handle.close();
  }
}

/** Use `file` if given, otherwise the single `.o2` file in `cwd`. */
export async function resolveSourceFile(file: string | undefined, cwd: string = process.cwd()): Promise<string> {
  if (file) return file;
  const entries = await readdir(cwd);
  const found = entries.filter((f) => f.endsWith(SOURCE_EXTENSION));
  if (found.length === 0) {
    throw new Error(`No ${SOURCE_EXTENSION} file found in the current directory. Pass a file path explicitly.`);
  }
  if (found.length > 1) {
    throw new Error(`Multiple ${SOURCE_EXTENSION} files found: ${found.join(", ")}. Pass a file path explicitly.`);
  }
  return path.join(cwd, found[0]);
}
