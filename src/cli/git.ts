import { spawnSync } from "child_process";
import { GitCommandError } from "../errors";

export interface GitClient {
  topLevel(): string;
  headSha(): string;
  currentBranch(): string;
  lastCommitMessage(): string;
  hasUncommittedChanges(): boolean;
  createAnnotatedTag(name: string, message: string): void;
}

export class ShellGitClient implements GitClient {
  constructor(private readonly cwd: string = process.cwd()) {}

  topLevel(): string {
    return this.run(["rev-parse", "--show-toplevel"]);
  }

  headSha(): string {
    return this.run(["rev-parse", "HEAD"]);
  }

  currentBranch(): string {
    return this.run(["rev-parse", "--abbrev-ref", "HEAD"]);
  }

  lastCommitMessage(): string {
    return this.run(["log", "-1", "--pretty=%B"]);
  }

  hasUncommittedChanges(): boolean {
    return this.run(["status", "--porcelain"]).length > 0;
  }

  createAnnotatedTag(name: string, message: string): void {
    this.run(["tag", "-a", name, "-m", message]);
  }

  private run(args: string[]): string {
    const result = spawnSync("git", args, {
      cwd: this.cwd,
      stdio: "pipe",
      encoding: "utf8"
    });

    if (result.error) {
      throw new GitCommandError(args, result.error.message);
    }

    if (result.status !== 0) {
      throw new GitCommandError(args, (result.stderr || "").trim());
    }

    return (result.stdout || "").trim();
  }
}
