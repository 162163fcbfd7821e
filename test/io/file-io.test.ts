import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { createStream, exists, getSize, readToString } from "../../src/io/file-reader";
import { deleteFile, writeString } from "../../src/io/file-writer";
import { readLines } from "../../src/io/stream-utils";
import { collect } from "../helpers";

describe("file I/O", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "intervalkit-io-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("exists is true only for regular files", async () => {
    const file = join(dir, "a.bed");
    await writeFile(file, "chr1\t0\t10\n");
    await mkdir(join(dir, "sub"));

    expect(await exists(file)).toBe(true);
    expect(await exists(join(dir, "missing.bed"))).toBe(false);
    expect(await exists(join(dir, "sub"))).toBe(false);
  });

  test("getSize and readToString", async () => {
    const file = join(dir, "a.bed");
    await writeFile(file, "chr1\t0\t10\n");

    expect(await getSize(file)).toBe(10);
    expect(await readToString(file)).toBe("chr1\t0\t10\n");
  });

  test("readToString refuses files over the size limit", async () => {
    const file = join(dir, "big.bed");
    await writeFile(file, "chr1\t0\t10\n");
    await expect(readToString(file, { maxFileSize: 5 })).rejects.toThrow(FileError);
  });

  test("reading a missing file is a FileError", async () => {
    await expect(readToString(join(dir, "missing.bed"))).rejects.toBeInstanceOf(FileError);
    await expect(createStream(join(dir, "missing.bed"))).rejects.toBeInstanceOf(FileError);
  });

  test("an empty or NUL-containing path is rejected", async () => {
    await expect(readToString("")).rejects.toBeInstanceOf(FileError);
    await expect(exists("a\0b")).rejects.toBeInstanceOf(FileError);
  });

  test("createStream yields the file's lines", async () => {
    const file = join(dir, "lines.bed");
    await writeFile(file, "chr1\t0\t10\r\n\nchr2\t5\t50");

    const lines = await collect(readLines(await createStream(file, { bufferSize: 3 })));
    expect(lines).toEqual(["chr1\t0\t10", "", "chr2\t5\t50"]);
  });

  test("writeString creates parent directories", async () => {
    const file = join(dir, "nested", "deeper", "out.bed");
    await writeString(file, "chr1\t0\t10\n");
    expect(await readFile(file, "utf8")).toBe("chr1\t0\t10\n");
  });

  test("writeString without directory creation fails on a missing parent", async () => {
    const file = join(dir, "absent", "out.bed");
    await expect(writeString(file, "x", { createDirectories: false })).rejects.toBeInstanceOf(FileError);
  });

  test("deleteFile removes the file", async () => {
    const file = join(dir, "gone.bed");
    await writeFile(file, "x");
    await deleteFile(file);
    expect(await exists(file)).toBe(false);
  });
});
