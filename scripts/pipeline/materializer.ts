import * as fs from "fs";
import * as path from "path";
import { randomUUID } from "crypto";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import AdmZip from "adm-zip";
import { asIOError, CorruptArchiveError, describeError, TransferError } from "./errors";

export type ArchiveFormat = "none" | "zip";

const ARCHIVE_EXTENSIONS: Record<string, ArchiveFormat> = {
  ".zip": "zip",
};

/** Which archive format, if any, a file name denotes. */
export function archiveFormatOf(name: string): ArchiveFormat {
  return ARCHIVE_EXTENSIONS[path.extname(name).toLowerCase()] ?? "none";
}

export interface MaterializeResult {
  byteSize: number;
  /** Files unpacked beside the archive; null when the file was not an archive. */
  extracted: string[] | null;
}

function tempPathFor(destinationPath: string): string {
  const dir = path.dirname(destinationPath);
  return path.join(dir, `.${path.basename(destinationPath)}.${randomUUID()}.part`);
}

/**
 * Stream `source` into a sibling temp file and rename it over
 * `destinationPath` once the stream has ended cleanly. Archives are then
 * unpacked in place (see extractAndReplace).
 */
export async function materialize(
  source: AsyncIterable<Uint8Array>,
  destinationPath: string,
): Promise<MaterializeResult> {
  const tempPath = tempPathFor(destinationPath);
  const directory = path.dirname(destinationPath);

  try {
    await fs.promises.mkdir(directory, { recursive: true });
  } catch (err: unknown) {
    throw (
      asIOError(err, directory) ??
      new TransferError(`Cannot create ${directory}: ${describeError(err)}`, destinationPath, { cause: err })
    );
  }

  try {
    await pipeline(Readable.from(source), fs.createWriteStream(tempPath, { flags: "wx" }));
    await fs.promises.rename(tempPath, destinationPath);
  } catch (err: unknown) {
    await fs.promises.rm(tempPath, { force: true });
    if (err instanceof TransferError) throw err;
    throw (
      asIOError(err, destinationPath) ??
      new TransferError(`Write failed: ${describeError(err)}`, destinationPath, { cause: err })
    );
  }

  const { size } = await fs.promises.stat(destinationPath);
  if (archiveFormatOf(destinationPath) === "none") {
    return { byteSize: size, extracted: null };
  }
  return { byteSize: size, extracted: await extractAndReplace(destinationPath) };
}

function openZip(archivePath: string): AdmZip {
  try {
    return new AdmZip(archivePath);
  } catch (err: unknown) {
    throw new CorruptArchiveError(`Not a readable zip archive: ${describeError(err)}`, archivePath, err);
  }
}

/**
 * Validate every entry of the archive, unpack it into the archive's own
 * directory and delete the archive. On any failure the archive stays put.
 */
export async function extractAndReplace(archivePath: string): Promise<string[]> {
  const format = archiveFormatOf(archivePath);
  if (format !== "zip") {
    throw new CorruptArchiveError(`Unsupported archive format for ${path.basename(archivePath)}`, archivePath);
  }

  const zip = openZip(archivePath);
  const targetDir = path.dirname(path.resolve(archivePath));
  const files: string[] = [];

  for (const entry of zip.getEntries()) {
    const target = path.resolve(targetDir, entry.entryName);
    if (!target.startsWith(targetDir + path.sep)) {
      throw new CorruptArchiveError(`Entry escapes the archive directory: ${entry.entryName}`, archivePath);
    }
    if (entry.isDirectory) continue;
    try {
      // getData inflates the entry and checks its CRC
      entry.getData();
    } catch (err: unknown) {
      throw new CorruptArchiveError(`Damaged entry ${entry.entryName}: ${describeError(err)}`, archivePath, err);
    }
    files.push(target);
  }

  try {
    zip.extractAllTo(targetDir, true);
  } catch (err: unknown) {
    throw (
      asIOError(err, targetDir) ??
      new CorruptArchiveError(`Extraction failed: ${describeError(err)}`, archivePath, err)
    );
  }

  await fs.promises.rm(archivePath);
  return files;
}
