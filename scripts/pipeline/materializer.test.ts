import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import AdmZip from "adm-zip";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CorruptArchiveError, IOError, TransferError } from "./errors";
import { archiveFormatOf, extractAndReplace, materialize } from "./materializer";

async function* chunks(...parts: Array<string | Uint8Array>): AsyncGenerator<Uint8Array> {
  for (const part of parts) yield typeof part === "string" ? Buffer.from(part) : part;
}

async function* brokenAfter(part: string): AsyncGenerator<Uint8Array> {
  yield Buffer.from(part);
  throw new TransferError("Connection lost: socket hang up", "http://mirror.test/files/a.bin");
}

function zipOf(files: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) zip.addFile(name, Buffer.from(content));
  return zip.toBuffer();
}

describe("archiveFormatOf", () => {
  it("maps zip extensions case-insensitively and everything else to none", () => {
    expect(archiveFormatOf("game.zip")).toBe("zip");
    expect(archiveFormatOf("/x/GAME.ZIP")).toBe("zip");
    expect(archiveFormatOf("game.bin")).toBe("none");
    expect(archiveFormatOf("game.zip.part")).toBe("none");
    expect(archiveFormatOf("README")).toBe("none");
  });
});

describe("materialize", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "materialize-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes the stream and leaves no temp file behind", async () => {
    const dest = path.join(dir, "nested", "a.bin");

    const result = await materialize(chunks("hello ", "world"), dest);

    expect(result).toEqual({ byteSize: 11, extracted: null });
    expect(fs.readFileSync(dest, "utf-8")).toBe("hello world");
    expect(fs.readdirSync(path.dirname(dest))).toEqual(["a.bin"]);
  });

  it("never exposes a partial file when the stream breaks", async () => {
    const dest = path.join(dir, "a.bin");

    await expect(materialize(brokenAfter("half"), dest)).rejects.toBeInstanceOf(TransferError);

    expect(fs.existsSync(dest)).toBe(false);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it("keeps the previous file intact when a replacement transfer fails", async () => {
    const dest = path.join(dir, "a.bin");
    fs.writeFileSync(dest, "old");

    await expect(materialize(brokenAfter("new"), dest)).rejects.toBeInstanceOf(TransferError);

    expect(fs.readFileSync(dest, "utf-8")).toBe("old");
  });

  it("unpacks a zip beside itself and deletes the archive", async () => {
    const dest = path.join(dir, "b.zip");
    const bytes = zipOf({ "b.txt": "inside b", "extra/c.txt": "inside c" });

    const result = await materialize(chunks(bytes), dest);

    expect(result.byteSize).toBe(bytes.length);
    expect(result.extracted?.sort()).toEqual([path.join(dir, "b.txt"), path.join(dir, "extra", "c.txt")]);
    expect(fs.existsSync(dest)).toBe(false);
    expect(fs.readFileSync(path.join(dir, "b.txt"), "utf-8")).toBe("inside b");
    expect(fs.readFileSync(path.join(dir, "extra", "c.txt"), "utf-8")).toBe("inside c");
  });

  it("keeps a truncated archive in place and reports it as corrupt", async () => {
    const dest = path.join(dir, "b.zip");
    const bytes = zipOf({ "b.txt": "inside b" });
    const truncated = bytes.subarray(0, bytes.length - 30);

    const error = await materialize(chunks(truncated), dest).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CorruptArchiveError);
    expect(fs.existsSync(dest)).toBe(true);
    expect(fs.readFileSync(dest).equals(truncated)).toBe(true);
    expect(fs.existsSync(path.join(dir, "b.txt"))).toBe(false);
  });

  it("reports a parent path occupied by a file as a disk error", async () => {
    fs.writeFileSync(path.join(dir, "blocked"), "not a directory");

    const error = await materialize(chunks("data"), path.join(dir, "blocked", "a.bin")).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(IOError);
    expect(fs.readFileSync(path.join(dir, "blocked"), "utf-8")).toBe("not a directory");
  });
});

describe("extractAndReplace", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "extract-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("rejects files that are not archives by name", async () => {
    const file = path.join(dir, "a.bin");
    fs.writeFileSync(file, "x");

    await expect(extractAndReplace(file)).rejects.toBeInstanceOf(CorruptArchiveError);
    expect(fs.existsSync(file)).toBe(true);
  });

  it("rejects an html error page saved under a zip name", async () => {
    const file = path.join(dir, "fake.zip");
    fs.writeFileSync(file, "<html><body>503 Service Unavailable</body></html>");

    await expect(extractAndReplace(file)).rejects.toBeInstanceOf(CorruptArchiveError);
    expect(fs.existsSync(file)).toBe(true);
  });

  it("refuses an entry that would land outside the archive's directory", async () => {
    const zip = new AdmZip();
    zip.addFile("evil.txt", Buffer.from("escaped"));
    zip.getEntries()[0].entryName = "../evil.txt";
    fs.mkdirSync(path.join(dir, "inner"));
    const file = path.join(dir, "inner", "evil.zip");
    fs.writeFileSync(file, zip.toBuffer());

    const error = await extractAndReplace(file).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CorruptArchiveError);
    expect(error).toMatchObject({ message: "Entry escapes the archive directory: ../evil.txt" });
    expect(fs.existsSync(path.join(dir, "evil.txt"))).toBe(false);
    expect(fs.readdirSync(path.join(dir, "inner"))).toEqual(["evil.zip"]);
  });
});
