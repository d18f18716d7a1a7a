import dotenv from "dotenv";
import { z } from "zod";

dotenv.config({ path: ".env.local" });
dotenv.config();

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value === "string") {
    return value.toLowerCase() === "true";
  }

  return value;
}, z.boolean());

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim().length === 0 ? undefined : value),
  z.string().optional()
);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(8080),
  MAX_UPLOAD_MB: z.coerce.number().int().positive().max(512).default(25),
  DOCUMENT_STORE: z.enum(["local", "http"]).default("local"),
  LOCAL_STORE_DIR: z.string().default(".git-doc-store"),
  UPLOAD_TEMP_DIR: optionalString,
  CMS_BASE_URL: optionalString.pipe(z.string().url().optional()),
  CMS_USERNAME: optionalString,
  CMS_PASSWORD: optionalString,
  ACTION_CODE_TRANSACTION: optionalString,
  DEBUG_LOGGING: booleanFromEnv.default(true),
  TRACE_REQUESTS: booleanFromEnv.default(false),
  CANCEL_CHECKOUT_ON_FAILURE: booleanFromEnv.default(false)
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("Invalid environment variables:", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;
export type Env = typeof env;
