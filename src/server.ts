import { env } from "./config/env";
import { createApp } from "./app";
import { createDocumentStoreFactory } from "./storage";

const app = createApp({
  createStore: createDocumentStoreFactory(),
  storeName: env.DOCUMENT_STORE
});

app.listen(env.PORT, () => {
  console.log(`git-doc-mapper action-code server listening on port ${env.PORT} (store: ${env.DOCUMENT_STORE})`);
});
