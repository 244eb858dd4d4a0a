import { afterEach, beforeEach, describe, it, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { FileError, readSource, resolveSourceFile } from "../../src/source.js";

describe("source files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "o2c-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads a file as text", async () => {
    const file = path.join(dir, "basic.o2");
    fs.writeFileSync(file, "int main() {\n    return 0;\n}\n");
    await expect(readSource(file)).resolves.toBe("int main() {\n    return 0;\n}\n");
  });

  it("fails to open a missing file", async () => {
    const file = path.join(dir, "missing.o2");
    const result = readSource(file);
    await expect(result).rejects.toBeInstanceOf(FileError);
    await expect(result).rejects.toMatchObject({
      kind: "UnableToOpen",
      file,
      message: `unable to open file '${file}'`,
    });
  });

  it("fails to read a directory", async () => {
    await expect(readSource(dir)).rejects.toMatchObject({
      kind: "UnableToRead",
      message: `unable to read file '${dir}'`,
    });
  });

  it("uses an explicit file as given", async () => {
    await expect(resolveSourceFile("other.o2", dir)).resolves.toBe("other.o2");
  });

  it("finds the only .o2 file in the directory", async () => {
    fs.writeFileSync(path.join(dir, "basic.o2"), "");
    fs.writeFileSync(path.join(dir, "notes.txt"), "");
    await expect(resolveSourceFile(undefined, dir)).resolves.toBe(path.join(dir, "basic.o2"));
  });

  it("fails when there is no .o2 file", async () => {
    await expect(resolveSourceFile(undefined, dir)).rejects.toThrow("No .o2 file found");
  });

  it("fails when there are several .o2 files", async () => {
    fs.writeFileSync(path.join(dir, "a.o2"), "");
    fs.writeFileSync(path.join(dir, "b.o2"), "");
    await expect(resolveSourceFile(undefined, dir)).rejects.toThrow("Multiple .o2 files found");
  });
});
