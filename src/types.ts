export type VersionFlag = "M" | "P";

export interface DocumentVersionRecord {
  docId: string;
  docVerId: string;
  versionLabel: string;
  editDate: Date;
  filename: string;
  contentType: string;
  checkedInBy?: string;
  checkedInComment?: string;
}

export interface NewVersionInput {
  docId: string;
  fileName: string;
  contentType: string;
  filePath: string;
  comment: string;
  versionFlag: VersionFlag;
  checkedInBy?: string;
}

export interface StoredContent {
  bytes: Buffer;
  contentType: string;
  fileName: string;
}

export interface StoreCredentials {
  username: string;
  password: string;
}

export interface UploadedTempFile {
  docId: string;
  fileName: string;
  contentType: string;
  filePath: string;
}

export interface ParsedUpload {
  tempDir: string;
  files: UploadedTempFile[];
  clientData: Record<string, unknown>;
}

export interface VersionSummary {
  _doc_ver_id: string;
  _version_label: string;
  _edit_date: string;
}

export interface VersionDetails extends VersionSummary {
  _checked_in_by: string | null;
  _checked_in_comment: string | null;
}

export interface PulledDocument extends VersionSummary {
  _filename: string;
  _content_type: string;
  _content: string;
}

export type PushResults = Record<string, VersionSummary>;
export type ShowResults = Record<string, VersionDetails>;
export type PullResults = Record<string, PulledDocument>;
export type RouteResults = PushResults | ShowResults | PullResults;
