#!/usr/bin/env node
import dotenv from "dotenv";
import { ApiAdaptor } from "./apiAdaptor";
import { ShellGitClient } from "./git";
import { getLog, logError } from "./logger";
import { createProgram } from "./program";
import { ReadlinePrompter } from "./prompt";

dotenv.config();

async function main(): Promise<void> {
  const prompter = new ReadlinePrompter();
  const program = createProgram({
    git: new ShellGitClient(),
    prompter,
    createApi: (options) => new ApiAdaptor(options),
    now: () => new Date(),
    cwd: process.cwd(),
    print: (text) => {
      process.stdout.write(`${text}\n`);
    }
  });

  try {
    await program.parseAsync(process.argv);
  } finally {
    prompter.close();
  }
}

main().catch((error: unknown) => {
  logError(getLog("cli"), error, "git-doc-mapper failed");
  process.exitCode = 1;
});
