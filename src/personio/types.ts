/**
 * Shared Personio type definitions used across auth, gateway, extraction,
 * document download and normalisation.
 */

export interface Credential {
  accessToken: string;
  /** Unix timestamp (ms) at which the access token expires. */
  expiresAt: number;
}

/**
 * Personio attribute objects look like `{ label, value, type, universal_id }`.
 * Values may themselves be nested objects (department, supervisor, ...).
 */
export type RawAttributes = Record<string, unknown>;

export interface RawMasterRecord {
  type?: string;
  id?: unknown;
  attributes?: RawAttributes;
  [key: string]: unknown;
}

export type RawEmploymentRecord = Record<string, unknown>;
export type RawCompensationRecord = Record<string, unknown>;

export interface RawEmployeeRecord {
  /** Undefined when master data carried no usable id; the Transformer rejects these. */
  employeeId: string | undefined;
  master: RawMasterRecord;
  employment: RawEmploymentRecord | undefined;
  compensation: RawCompensationRecord[];
}

export interface DocumentRef {
  employeeId: string;
  documentId: string;
  filename: string;
  /** Gateway endpoint or absolute URL serving the binary payload. */
  downloadPath: string;
}

export interface PersonioPage {
  endpoint: string;
  /** 0-based position of this page within its sequence. */
  index: number;
  items: unknown[];
}
