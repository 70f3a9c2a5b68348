/**
 * Extraction: pulls master data, employments, compensations and document
 * metadata through the gateway and joins them by employee id.
 *
 * Master data is the authoritative employee universe: ids that only appear in
 * a dependent resource are dropped, and employees missing a dependent record
 * are kept with that part empty. Any resource that fails after retries fails
 * the whole extraction.
 */

import type { Logger } from "pino";
import type { PersonioGateway } from "./gateway.js";
import {
  asRecord,
  isRecord,
  masterEmployeeId,
  referencedEmployeeId,
  scalarText,
  type UnknownRecord,
} from "./records.js";
import type { DocumentRef, RawEmployeeRecord } from "./types.js";

export interface ExtractorEndpoints {
  employees: string;
  employments: string;
  compensations: string;
  documents: string;
}

export const DEFAULT_ENDPOINTS: ExtractorEndpoints = {
  employees: "company/employees",
  employments: "company/employments",
  compensations: "company/compensations",
  documents: "company/document-management/documents",
};

export interface ExtractOptions {
  /** Document metadata is only fetched when documents will be downloaded. */
  includeDocuments: boolean;
}

export interface ExtractionResult {
  records: RawEmployeeRecord[];
  documents: DocumentRef[];
}

export class PersonioExtractor {
  private readonly endpoints: ExtractorEndpoints;

  constructor(
    private readonly gateway: PersonioGateway,
    private readonly logger: Logger,
    endpoints: Partial<ExtractorEndpoints> = {}
  ) {
    this.endpoints = { ...DEFAULT_ENDPOINTS, ...endpoints };
  }

  async extractAll(options: ExtractOptions): Promise<ExtractionResult> {
    const { logger } = this;

    logger.info("Fetching employee master data");
    const masters = await this.fetchAll(this.endpoints.employees);
    const { byId, records } = joinMasterData(masters);
    logger.info({ count: records.length }, "Fetched employees");

    const employments = await this.fetchAll(this.endpoints.employments);
    const droppedEmployments = enrich(byId, employments, (record, item) => {
      // Last employment in server order wins.
      record.employment = item;
    });

    const compensations = await this.fetchAll(this.endpoints.compensations);
    const droppedCompensations = enrich(byId, compensations, (record, item) => {
      record.compensation.push(item);
    });

    if (droppedEmployments + droppedCompensations > 0) {
      logger.debug(
        { employments: droppedEmployments, compensations: droppedCompensations },
        "Dropped records for employees absent from master data"
      );
    }

    let documents: DocumentRef[] = [];
    if (options.includeDocuments) {
      const metadata = await this.fetchAll(this.endpoints.documents);
      documents = toDocumentRefs(metadata, byId);
      logger.info({ count: documents.length }, "Fetched document metadata");
    }

    return { records, documents };
  }

  /** Drain one paginated resource. Partial pages are discarded on failure. */
  private async fetchAll(endpoint: string): Promise<UnknownRecord[]> {
    const items: UnknownRecord[] = [];
    for await (const page of this.gateway.paginate(endpoint)) {
      for (const item of page.items) {
        if (isRecord(item)) items.push(item);
      }
    }
    return items;
  }
}

// ---------------------------------------------------------------------------
// Join helpers
// ---------------------------------------------------------------------------

function joinMasterData(masters: UnknownRecord[]): {
  byId: Map<string, RawEmployeeRecord>;
  records: RawEmployeeRecord[];
} {
  const byId = new Map<string, RawEmployeeRecord>();
  const records: RawEmployeeRecord[] = [];

  for (const master of masters) {
    const employeeId = masterEmployeeId(master);
    if (employeeId !== undefined && byId.has(employeeId)) continue;

    const record: RawEmployeeRecord = {
      employeeId,
      master,
      employment: undefined,
      compensation: [],
    };
    records.push(record);
    if (employeeId !== undefined) byId.set(employeeId, record);
  }
  return { byId, records };
}

/** Attach dependent records; returns how many referenced unknown employees. */
function enrich(
  byId: Map<string, RawEmployeeRecord>,
  items: UnknownRecord[],
  attach: (record: RawEmployeeRecord, item: UnknownRecord) => void
): number {
  let dropped = 0;
  for (const item of items) {
    const employeeId = referencedEmployeeId(item);
    const record = employeeId !== undefined ? byId.get(employeeId) : undefined;
    if (record) attach(record, item);
    else dropped += 1;
  }
  return dropped;
}

function toDocumentRefs(
  metadata: UnknownRecord[],
  byId: Map<string, RawEmployeeRecord>
): DocumentRef[] {
  const refs: DocumentRef[] = [];
  for (const raw of metadata) {
    const doc = isRecord(raw.attributes) ? { ...raw, ...raw.attributes } : raw;
    const employeeId = referencedEmployeeId(doc);
    const documentId = scalarText(doc.id);
    if (!employeeId || !documentId || !byId.has(employeeId)) continue;

    refs.push({
      employeeId,
      documentId,
      filename: documentFilename(doc, documentId),
      downloadPath:
        scalarText(doc.download_url) ||
        scalarText(asRecord(doc.links).download) ||
        `company/employees/${employeeId}/documents/${documentId}/download`,
    });
  }
  return refs;
}

function documentFilename(doc: UnknownRecord, documentId: string): string {
  const name = scalarText(doc.file_name) || scalarText(doc.title) || `document_${documentId}`;
  const extension = scalarText(doc.extension).replace(/^\.+/, "");
  if (!extension || name.toLowerCase().endsWith(`.${extension.toLowerCase()}`)) return name;
  return `${name}.${extension}`;
}
