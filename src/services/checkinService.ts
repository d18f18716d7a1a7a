import { rm } from "fs/promises";
import { UnrecognizedVersionTypeError } from "../errors";
import { describeError, logDebug, logError } from "../logging";
import { DocumentStore } from "../storage/DocumentStore";
import {
  DocumentVersionRecord,
  ParsedUpload,
  PushResults,
  UploadedTempFile,
  VersionFlag,
  VersionSummary
} from "../types";

export const MAJOR_VERSION_FLAG: VersionFlag = "M";
export const MINOR_VERSION_FLAG: VersionFlag = "P";

export interface CheckInOptions {
  checkedInBy?: string;
  cancelCheckoutOnFailure: boolean;
}

export function resolveVersionFlag(versionLabel: unknown): VersionFlag {
  const normalized = typeof versionLabel === "string" ? versionLabel.toUpperCase() : "";

  if (normalized === "MAJOR") {
    return MAJOR_VERSION_FLAG;
  }

  if (normalized === "MINOR") {
    return MINOR_VERSION_FLAG;
  }

  throw new UnrecognizedVersionTypeError(versionLabel);
}

// ISO local date-time in UTC, e.g. 2026-10-19T08:30:00 or 2026-10-19T08:30:00.250
export function formatEditDate(date: Date): string {
  return date.toISOString().replace(/(\.000)?Z$/, "");
}

export function toVersionSummary(record: DocumentVersionRecord): VersionSummary {
  return {
    _doc_ver_id: record.docVerId,
    _version_label: record.versionLabel,
    _edit_date: formatEditDate(record.editDate)
  };
}

async function cancelCheckoutQuietly(store: DocumentStore, docId: string): Promise<void> {
  try {
    await store.cancelCheckout(docId);
    logDebug("[GIT-DOC-CHECKIN]", { docId, action: "cancelCheckout" });
  } catch (error) {
    logError("[GIT-DOC-CHECKIN]", { docId, action: "cancelCheckout", error: describeError(error) });
  }
}

/**
 * Checks out the version series, saves the uploaded file as its new version and
 * reads the current version back. Returns null when any step fails; the temp
 * file is removed either way.
 */
export async function checkInNewDocument(
  store: DocumentStore,
  file: UploadedTempFile,
  checkedInComment: string,
  versionFlag: VersionFlag,
  options: CheckInOptions
): Promise<DocumentVersionRecord | null> {
  try {
    await store.checkout(file.docId);

    await store.saveNewVersion({
      docId: file.docId,
      fileName: file.fileName,
      contentType: file.contentType,
      filePath: file.filePath,
      comment: checkedInComment,
      versionFlag,
      checkedInBy: options.checkedInBy
    });
    logDebug("[GIT-DOC-CHECKIN]", `Saved new document version in document version series [${file.docId}]`);

    const current = await store.getCurrentVersion(file.docId);
    if (current) {
      logDebug("[GIT-DOC-CHECKIN]", `Retrieved current document version [${current.docVerId}]`);
    }

    return current;
  } catch (error) {
    logError("[GIT-DOC-CHECKIN]", { docId: file.docId, error: describeError(error) });

    if (options.cancelCheckoutOnFailure) {
      await cancelCheckoutQuietly(store, file.docId);
    }

    return null;
  } finally {
    await rm(file.filePath, { force: true });
  }
}

export async function pushDocuments(
  store: DocumentStore,
  upload: ParsedUpload,
  options: CheckInOptions
): Promise<PushResults> {
  const { version_type: versionType, ...commentData } = upload.clientData;
  const versionFlag = resolveVersionFlag(versionType);
  const checkedInComment = JSON.stringify(commentData);

  const uploadResults: PushResults = {};

  for (const file of upload.files) {
    const version = await checkInNewDocument(store, file, checkedInComment, versionFlag, options);

    if (!version) {
      logError("[GIT-DOC-PUSH]", `Document profile was not returned for [${file.docId}], check logs.`);
      continue;
    }

    logDebug(
      "[GIT-DOC-PUSH]",
      `Saved new document: docId [${file.docId}] docVerId [${version.docVerId}] versionLabel [${version.versionLabel}]`
    );

    uploadResults[file.docId] = toVersionSummary(version);
  }

  return uploadResults;
}
