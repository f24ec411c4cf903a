import { Command, InvalidArgumentError } from "commander";

import { loadAppContext } from "../app/config/load-app-context.js";
import type { AppContext } from "../app/context.js";

import { buildCommand } from "./build.js";
import { checkCommand } from "./check.js";
import { listCommand } from "./list.js";
import { statusCommand } from "./status.js";
import { validateCommand } from "./validate.js";

export type GlobalOptions = {
  config?: string;
  output?: string;
  debug: boolean;
};

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function buildCli(): Command {
  const program = new Command();

  const resolveContext = (): AppContext => {
    const globals = program.opts<GlobalOptions>();
    return loadAppContext({
      explicitConfigPath: globals.config,
      outputDir: globals.output,
    }).appContext;
  };

  program
    .name("upm-mirror")
    .description("Mirror git repository subtrees into Unity packages with stable .meta GUIDs")
    .version("0.1.0")
    .option("--config <path>", "Mirror config path (defaults to the nearest upm-mirror.yaml)")
    .option("--output <dir>", "Override settings.output_dir")
    .option("--debug", "Show error details and stack traces", false);

  program
    .command("build")
    .description("Sync packages whose source ref or config changed")
    .argument("[packages...]", "Package names (default: all)")
    .option("--force", "Rebuild even when the resolved ref is unchanged", false)
    .option("--max-parallel <n>", "Packages synced concurrently", parsePositiveInt)
    .action(async (packages: string[], opts: { force: boolean; maxParallel?: number }) => {
      await buildCommand(resolveContext(), {
        packages,
        force: opts.force,
        maxParallel: opts.maxParallel,
      });
    });

  program
    .command("check")
    .description("Report which packages need a rebuild without building")
    .argument("[packages...]", "Package names (default: all)")
    .action(async (packages: string[]) => {
      await checkCommand(resolveContext(), { packages });
    });

  program
    .command("list")
    .description("List configured packages")
    .action(() => {
      listCommand(resolveContext());
    });

  program
    .command("status")
    .description("Show the recorded sync state of each package")
    .action(async () => {
      await statusCommand(resolveContext());
    });

  program
    .command("validate")
    .description("Load and validate the mirror config")
    .action(() => {
      validateCommand(resolveContext());
    });

  return program;
}
