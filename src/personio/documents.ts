/**
 * Employee document download: writes each document's binary payload to
 * `<outputRoot>/documents/<employeeId>/<filename>`.
 * A failed document is recorded in the report and never aborts the batch.
 */

import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { errorMessage } from "../errors.js";
import type { PersonioGateway } from "./gateway.js";
import type { DocumentRef } from "./types.js";

/** Employee ids become directory names; allow only safe chars to prevent path traversal. */
const SAFE_EMPLOYEE_ID = /^[A-Za-z0-9_-]{1,64}$/;

const DEFAULT_CONCURRENCY = 4;

export interface DocumentFailure {
  ref: DocumentRef;
  reason: string;
}

export interface FetchReport {
  succeeded: number;
  failed: DocumentFailure[];
}

export interface FetchDocumentsOptions {
  /** Parallel downloads; all workers share one gateway and token. */
  concurrency?: number;
}

export class DocumentFetcher {
  constructor(
    private readonly gateway: PersonioGateway,
    private readonly logger: Logger
  ) {}

  async fetchDocuments(
    refs: DocumentRef[],
    outputRoot: string,
    enabled: boolean,
    options: FetchDocumentsOptions = {}
  ): Promise<FetchReport> {
    const report: FetchReport = { succeeded: 0, failed: [] };
    if (!enabled) return report;

    const documentsRoot = path.join(outputRoot, "documents");
    const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    const filenames = assignFilenames(refs);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < refs.length) {
        const index = next++;
        const ref = refs[index];
        try {
          const target = await this.downloadOne(ref, filenames[index], documentsRoot);
          report.succeeded += 1;
          this.logger.debug({ employeeId: ref.employeeId, path: target }, "Document saved");
        } catch (err) {
          const reason = errorMessage(err);
          report.failed.push({ ref, reason });
          this.logger.warn(
            { employeeId: ref.employeeId, documentId: ref.documentId, reason },
            "Document download failed"
          );
        }
      }
    };

    await Promise.all(
      Array.from({ length: Math.min(concurrency, refs.length) }, () => worker())
    );

    this.logger.info(
      { succeeded: report.succeeded, failed: report.failed.length },
      "Document download finished"
    );
    return report;
  }

  private async downloadOne(
    ref: DocumentRef,
    filename: string,
    documentsRoot: string
  ): Promise<string> {
    if (!SAFE_EMPLOYEE_ID.test(ref.employeeId)) {
      throw new Error(`Invalid employee id for document directory: "${ref.employeeId}"`);
    }
    const payload = await this.gateway.download(ref.downloadPath);

    const dir = path.join(documentsRoot, ref.employeeId);
    await fs.promises.mkdir(dir, { recursive: true });
    const target = path.join(dir, filename);
    // Re-runs overwrite the previous file of the same name.
    await fs.promises.writeFile(target, payload);
    return target;
  }
}

/**
 * One filename per ref, unique per employee directory (case-insensitively).
 * A clash within the batch gets the document id appended to the stem.
 */
export function assignFilenames(refs: readonly DocumentRef[]): string[] {
  const taken = new Set<string>();
  return refs.map((ref) => {
    let name = safeFilename(ref.filename, ref.documentId);
    if (taken.has(`${ref.employeeId}/${name}`.toLowerCase())) {
      const { name: stem, ext } = path.parse(name);
      name = `${stem}_${ref.documentId.replace(/[^A-Za-z0-9_-]/g, "")}${ext}`;
    }
    taken.add(`${ref.employeeId}/${name}`.toLowerCase());
    return name;
  });
}

/**
 * Keep only `[A-Za-z0-9._- ]`; a name that cleans down to nothing (or to dots)
 * falls back to `document_<id>`.
 */
export function safeFilename(filename: string, documentId: string): string {
  const cleaned = filename.replace(/[^A-Za-z0-9._\- ]/g, "").trim();
  if (!cleaned || /^\.+$/.test(cleaned)) {
    return `document_${documentId.replace(/[^A-Za-z0-9_-]/g, "")}`;
  }
  return cleaned;
}
