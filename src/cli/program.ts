import { Command } from "commander";
import { registerMapCommand } from "./commands/map";
import { registerPullCommand } from "./commands/pull";
import { registerPushCommand } from "./commands/push";
import { registerShowCommand } from "./commands/show";
import { CliDependencies } from "./commands/context";

export function createProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name("git-doc-mapper")
    .description(
      "Interface between a local git working tree and a document repository. " +
        "Every operation goes through the file map, which maps document ids to local files."
    )
    .enablePositionalOptions();

  registerPushCommand(program, deps);
  registerShowCommand(program, deps);
  registerPullCommand(program, deps);
  registerMapCommand(program, deps);

  return program;
}
