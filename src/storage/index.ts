import { env } from "../config/env";
import { DocumentStoreFactory } from "./DocumentStore";
import { HttpDocumentStore } from "./HttpDocumentStore";
import { LocalDocumentStore } from "./LocalDocumentStore";

export function createDocumentStoreFactory(): DocumentStoreFactory {
  if (env.DOCUMENT_STORE === "http") {
    const baseUrl = env.CMS_BASE_URL;
    if (!baseUrl) {
      throw new Error("CMS_BASE_URL is required for http document store");
    }

    return (credentials) =>
      new HttpDocumentStore({
        baseUrl,
        username: credentials.username || env.CMS_USERNAME,
        password: credentials.password || env.CMS_PASSWORD
      });
  }

  return (credentials) =>
    new LocalDocumentStore({
      rootDir: env.LOCAL_STORE_DIR,
      actor: credentials.username
    });
}
