import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DocumentFetcher, assignFilenames, safeFilename } from "../src/personio/documents.js";
import { PersonioGateway } from "../src/personio/gateway.js";
import { TokenProvider } from "../src/personio/auth.js";
import { createSilentLogger } from "../src/logger.js";
import type { DocumentRef } from "../src/personio/types.js";
import { BASE_URL, createFakePersonio, type FakePersonioData } from "./helpers/fake-personio.js";

function ref(employeeId: string, documentId: string, filename: string): DocumentRef {
  return {
    employeeId,
    documentId,
    filename,
    downloadPath: `company/employees/${employeeId}/documents/${documentId}/download`,
  };
}

function fetcherFor(data: FakePersonioData) {
  const fake = createFakePersonio(data);
  vi.stubGlobal("fetch", fake.fetch);
  const logger = createSilentLogger();
  const gateway = new PersonioGateway({
    baseUrl: BASE_URL,
    tokens: new TokenProvider({
      clientId: "client-id",
      clientSecret: "test-secret",
      baseUrl: BASE_URL,
      timeoutMs: 1_000,
      logger,
    }),
    timeoutMs: 1_000,
    retryMaxAttempts: 1,
    logger,
  });
  return { fake, fetcher: new DocumentFetcher(gateway, logger) };
}

describe("DocumentFetcher", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "documents-test-"));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("writes each document under documents/<employeeId>/", async () => {
    const { fetcher } = fetcherFor({
      downloads: {
        "/v1/company/employees/1000/documents/10/download": Buffer.from("contract-bytes"),
        "/v1/company/employees/1001/documents/11/download": Buffer.from([0, 1, 2, 255]),
      },
    });

    const report = await fetcher.fetchDocuments(
      [ref("1000", "10", "contract.pdf"), ref("1001", "11", "payslip.pdf")],
      dir,
      true
    );

    expect(report).toEqual({ succeeded: 2, failed: [] });
    expect(
      await fs.promises.readFile(path.join(dir, "documents", "1000", "contract.pdf"), "utf8")
    ).toBe("contract-bytes");
    expect(
      await fs.promises.readFile(path.join(dir, "documents", "1001", "payslip.pdf"))
    ).toEqual(Buffer.from([0, 1, 2, 255]));
  });

  it("records a failed download and carries on with the rest", async () => {
    const { fetcher } = fetcherFor({
      downloads: {
        "/v1/company/employees/1000/documents/10/download": { status: 404 },
        "/v1/company/employees/1000/documents/11/download": Buffer.from("ok"),
      },
    });
    const broken = ref("1000", "10", "missing.pdf");

    const report = await fetcher.fetchDocuments(
      [broken, ref("1000", "11", "ok.pdf")],
      dir,
      true,
      { concurrency: 1 }
    );

    expect(report.succeeded).toBe(1);
    expect(report.failed).toHaveLength(1);
    expect(report.failed[0].ref).toEqual(broken);
    expect(report.failed[0].reason).toMatch(/404/);
    expect(fs.existsSync(path.join(dir, "documents", "1000", "ok.pdf"))).toBe(true);
    expect(fs.existsSync(path.join(dir, "documents", "1000", "missing.pdf"))).toBe(false);
  });

  it("does nothing when documents are disabled", async () => {
    const { fetcher, fake } = fetcherFor({});

    const report = await fetcher.fetchDocuments([ref("1000", "10", "a.pdf")], dir, false);

    expect(report).toEqual({ succeeded: 0, failed: [] });
    expect(fake.fetch).not.toHaveBeenCalled();
    expect(fs.existsSync(path.join(dir, "documents"))).toBe(false);
  });

  it("refuses employee ids that are unsafe as directory names", async () => {
    const { fetcher, fake } = fetcherFor({});

    const report = await fetcher.fetchDocuments([ref("../etc", "10", "a.pdf")], dir, true);

    expect(report.succeeded).toBe(0);
    expect(report.failed[0].reason).toMatch(/Invalid employee id/);
    expect(fake.fetch).not.toHaveBeenCalled();
  });

  it("overwrites a previously downloaded file of the same name", async () => {
    const target = path.join(dir, "documents", "1000", "contract.pdf");
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, "old");
    const { fetcher } = fetcherFor({
      downloads: {
        "/v1/company/employees/1000/documents/10/download": Buffer.from("new"),
      },
    });

    await fetcher.fetchDocuments([ref("1000", "10", "contract.pdf")], dir, true);

    expect(await fs.promises.readFile(target, "utf8")).toBe("new");
  });

  it("keeps both documents when their names clean to the same file", async () => {
    const { fetcher } = fetcherFor({
      downloads: {
        "/v1/company/employees/1000/documents/20/download": Buffer.from("may"),
        "/v1/company/employees/1000/documents/21/download": Buffer.from("june"),
      },
    });

    const report = await fetcher.fetchDocuments(
      [ref("1000", "20", "Payslip:.pdf"), ref("1000", "21", "Payslip?.pdf")],
      dir,
      true,
      { concurrency: 2 }
    );

    expect(report).toEqual({ succeeded: 2, failed: [] });
    const employeeDir = path.join(dir, "documents", "1000");
    expect((await fs.promises.readdir(employeeDir)).sort()).toEqual([
      "Payslip.pdf",
      "Payslip_21.pdf",
    ]);
    expect(await fs.promises.readFile(path.join(employeeDir, "Payslip.pdf"), "utf8")).toBe("may");
    expect(await fs.promises.readFile(path.join(employeeDir, "Payslip_21.pdf"), "utf8")).toBe(
      "june"
    );
  });

  it("downloads everything with several workers", async () => {
    const downloads: Record<string, Buffer> = {};
    const refs: DocumentRef[] = [];
    for (let i = 0; i < 7; i++) {
      downloads[`/v1/company/employees/1000/documents/${i}/download`] = Buffer.from(`doc-${i}`);
      refs.push(ref("1000", String(i), `doc-${i}.txt`));
    }
    const { fetcher } = fetcherFor({ downloads });

    const report = await fetcher.fetchDocuments(refs, dir, true, { concurrency: 3 });

    expect(report.succeeded).toBe(7);
    expect((await fs.promises.readdir(path.join(dir, "documents", "1000"))).sort()).toEqual(
      refs.map((r) => r.filename).sort()
    );
  });
});

describe("safeFilename", () => {
  it("keeps letters, digits, dot, underscore, dash and space", () => {
    expect(safeFilename("Contract 2024_v1-final.pdf", "1")).toBe("Contract 2024_v1-final.pdf");
  });

  it("strips path separators and other characters", () => {
    expect(safeFilename("../../etc/passwd", "1")).toBe("....etcpasswd");
    expect(safeFilename("Gehalt: März?.pdf", "1")).toBe("Gehalt Mrz.pdf");
  });

  it("falls back to the document id when nothing usable remains", () => {
    expect(safeFilename("???", "42")).toBe("document_42");
    expect(safeFilename("..", "42")).toBe("document_42");
    expect(safeFilename("   ", "42")).toBe("document_42");
  });
});

describe("assignFilenames", () => {
  it("appends the document id to names already taken in the same directory", () => {
    expect(
      assignFilenames([
        ref("1000", "1", "contract.pdf"),
        ref("1000", "2", "CONTRACT.pdf"),
        ref("1001", "3", "contract.pdf"),
        ref("1000", "4", "notes"),
        ref("1000", "5", "notes"),
      ])
    ).toEqual(["contract.pdf", "CONTRACT_2.pdf", "contract.pdf", "notes", "notes_5"]);
  });
});
