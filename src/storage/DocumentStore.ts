import { DocumentVersionRecord, NewVersionInput, StoreCredentials, StoredContent } from "../types";

export interface DocumentStore {
  readonly name: string;
  checkout(docId: string): Promise<void>;
  saveNewVersion(input: NewVersionInput): Promise<void>;
  getCurrentVersion(docId: string): Promise<DocumentVersionRecord | null>;
  getVersionContent(docId: string, docVerId: string): Promise<StoredContent | null>;
  cancelCheckout(docId: string): Promise<void>;
}

export type DocumentStoreFactory = (credentials: StoreCredentials) => DocumentStore;
