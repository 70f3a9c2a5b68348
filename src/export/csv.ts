/**
 * Atomic CSV writer.
 *
 * Each file is formatted with @fast-csv/format into a sibling temp file
 * (`<name>.tmp.<uuid>`) and only renamed into place once every file in the
 * batch has been staged, so a failed run never leaves a truncated CSV under
 * its final name.
 */

import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { format } from "@fast-csv/format";
import { FileWriteError, errorMessage } from "../errors.js";

export type CsvRow = Record<string, string>;

export interface CsvFile {
  path: string;
  /** Header row, in output order. */
  columns: readonly string[];
  rows: readonly CsvRow[];
}

/** Write one CSV file atomically. */
export async function writeCsv(
  filePath: string,
  rows: readonly CsvRow[],
  columns: readonly string[]
): Promise<void> {
  await writeCsvFiles([{ path: filePath, rows, columns }]);
}

/**
 * Stage all files, then move them into place. Existing targets are moved
 * aside first; any failure removes the staged temp files, puts the previous
 * targets back and raises FileWriteError.
 */
export async function writeCsvFiles(files: readonly CsvFile[]): Promise<void> {
  const staged: { tmp: string; target: string }[] = [];
  const committed: { target: string; backup?: string }[] = [];

  try {
    for (const file of files) {
      staged.push({ tmp: await stage(file), target: file.path });
    }
    for (const { tmp, target } of staged) {
      const entry = { target, backup: await moveAside(target) };
      committed.push(entry);
      await renameOrFail(tmp, target);
    }
  } catch (err) {
    await Promise.allSettled([
      ...staged.map(({ tmp }) => fs.promises.rm(tmp, { force: true })),
      ...committed.map(({ target, backup }) =>
        backup ? fs.promises.rename(backup, target) : fs.promises.rm(target, { force: true })
      ),
    ]);
    throw err;
  }

  await Promise.allSettled(
    committed.map(({ backup }) => (backup ? fs.promises.rm(backup, { force: true }) : undefined))
  );
}

/** Rename an existing target to a backup sibling; undefined when there was none. */
async function moveAside(target: string): Promise<string | undefined> {
  const backup = `${target}.bak.${crypto.randomUUID()}`;
  try {
    await fs.promises.rename(target, backup);
    return backup;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw new FileWriteError(
      `Failed to move existing CSV file ${target} aside: ${errorMessage(err)}`,
      target,
      { cause: err }
    );
  }
}

async function stage(file: CsvFile): Promise<string> {
  const dir = path.dirname(file.path);
  try {
    await fs.promises.mkdir(dir, { recursive: true });
  } catch (err) {
    throw new FileWriteError(
      `Cannot create output directory ${dir}: ${errorMessage(err)}`,
      file.path,
      { cause: err }
    );
  }

  const tmp = `${file.path}.tmp.${crypto.randomUUID()}`;

  const formatter = format<CsvRow, CsvRow>({
    headers: [...file.columns],
    alwaysWriteHeaders: true,
    includeEndRowDelimiter: true,
  });

  try {
    await pipeline(
      Readable.from(file.rows),
      formatter,
      fs.createWriteStream(tmp, { encoding: "utf8", mode: 0o644 })
    );
  } catch (err) {
    await fs.promises.rm(tmp, { force: true });
    throw new FileWriteError(
      `Failed to write CSV file ${file.path}: ${errorMessage(err)}`,
      file.path,
      { cause: err }
    );
  }
  return tmp;
}

async function renameOrFail(tmp: string, target: string): Promise<void> {
  try {
    await fs.promises.rename(tmp, target);
  } catch (err) {
    throw new FileWriteError(
      `Failed to move CSV file into place at ${target}: ${errorMessage(err)}`,
      target,
      { cause: err }
    );
  }
}
