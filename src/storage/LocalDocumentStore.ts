import { copyFile, mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { DocumentNotFoundError, HttpError } from "../errors";
import { DocumentVersionRecord, NewVersionInput, StoredContent, VersionFlag } from "../types";
import { DocumentStore } from "./DocumentStore";

const storedVersionSchema = z.object({
  docVerId: z.string(),
  versionLabel: z.string(),
  editDate: z.string(),
  filename: z.string(),
  contentType: z.string(),
  checkedInBy: z.string().optional(),
  checkedInComment: z.string().optional()
});

const seriesSchema = z.object({
  docId: z.string(),
  checkedOutBy: z.string().nullable(),
  versions: z.array(storedVersionSchema)
});

type StoredSeries = z.infer<typeof seriesSchema>;
type StoredVersion = z.infer<typeof storedVersionSchema>;

const SAFE_DOC_ID = /^[A-Za-z0-9._-]+$/;

export function nextVersionLabel(previousLabel: string | undefined, versionFlag: VersionFlag): string {
  if (!previousLabel) {
    return versionFlag === "M" ? "1.0" : "0.1";
  }

  const [majorPart, minorPart] = previousLabel.split(".");
  const major = Number.parseInt(majorPart ?? "0", 10) || 0;
  const minor = Number.parseInt(minorPart ?? "0", 10) || 0;

  return versionFlag === "M" ? `${major + 1}.0` : `${major}.${minor + 1}`;
}

function toRecord(docId: string, version: StoredVersion): DocumentVersionRecord {
  return {
    docId,
    docVerId: version.docVerId,
    versionLabel: version.versionLabel,
    editDate: new Date(version.editDate),
    filename: version.filename,
    contentType: version.contentType,
    checkedInBy: version.checkedInBy,
    checkedInComment: version.checkedInComment
  };
}

/**
 * Development stand-in for the CMS. Keeps every uploaded version on disk so the
 * action-code server can run without a document repository behind it.
 */
export class LocalDocumentStore implements DocumentStore {
  readonly name = "local";
  private readonly rootDir: string;
  private readonly actor: string;
  private readonly now: () => Date;

  constructor(options: { rootDir: string; actor: string; now?: () => Date }) {
    this.rootDir = options.rootDir;
    this.actor = options.actor;
    this.now = options.now ?? (() => new Date());
  }

  async checkout(docId: string): Promise<void> {
    const series = (await this.readSeries(docId)) ?? { docId, checkedOutBy: null, versions: [] };
    series.checkedOutBy = this.actor;
    await this.writeSeries(series);
  }

  async saveNewVersion(input: NewVersionInput): Promise<void> {
    const series = await this.requireSeries(input.docId);
    if (!series.checkedOutBy) {
      throw new Error(`Document version series [${input.docId}] is not checked out`);
    }

    const previous = series.versions[series.versions.length - 1];
    const docVerId = String(series.versions.length + 1);

    await copyFile(input.filePath, this.contentPath(input.docId, docVerId));

    series.versions.push({
      docVerId,
      versionLabel: nextVersionLabel(previous?.versionLabel, input.versionFlag),
      editDate: this.now().toISOString(),
      filename: input.fileName,
      contentType: input.contentType,
      checkedInBy: input.checkedInBy ?? this.actor,
      checkedInComment: input.comment
    });
    series.checkedOutBy = null;

    await this.writeSeries(series);
  }

  async getCurrentVersion(docId: string): Promise<DocumentVersionRecord | null> {
    const series = await this.readSeries(docId);
    const current = series?.versions[series.versions.length - 1];
    if (!current) {
      return null;
    }

    return toRecord(docId, current);
  }

  async getVersionContent(docId: string, docVerId: string): Promise<StoredContent | null> {
    const series = await this.readSeries(docId);
    const version = series?.versions.find((candidate) => candidate.docVerId === docVerId);
    if (!version) {
      return null;
    }

    const bytes = await readFile(this.contentPath(docId, docVerId));
    return {
      bytes,
      contentType: version.contentType,
      fileName: version.filename
    };
  }

  async cancelCheckout(docId: string): Promise<void> {
    const series = await this.readSeries(docId);
    if (!series || !series.checkedOutBy) {
      return;
    }

    series.checkedOutBy = null;
    await this.writeSeries(series);
  }

  private seriesDir(docId: string): string {
    if (!SAFE_DOC_ID.test(docId) || docId === "." || docId === "..") {
      throw new HttpError(400, `Invalid document id: ${docId}`);
    }

    return path.join(this.rootDir, docId);
  }

  private contentPath(docId: string, docVerId: string): string {
    return path.join(this.seriesDir(docId), `${docVerId}.bin`);
  }

  private async requireSeries(docId: string): Promise<StoredSeries> {
    const series = await this.readSeries(docId);
    if (!series) {
      throw new DocumentNotFoundError(docId);
    }

    return series;
  }

  private async readSeries(docId: string): Promise<StoredSeries | null> {
    const filePath = path.join(this.seriesDir(docId), "series.json");

    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }

    return seriesSchema.parse(JSON.parse(raw));
  }

  private async writeSeries(series: StoredSeries): Promise<void> {
    const dir = this.seriesDir(series.docId);
    await mkdir(dir, { recursive: true });
    await writeFile(path.join(dir, "series.json"), `${JSON.stringify(series, null, 2)}\n`, "utf8");
  }
}
