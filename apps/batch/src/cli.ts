import { Command, type OutputConfiguration } from "commander";

export const CLI_VERSION = "0.1.0";

export interface AnonymizeCommandOptions {
  schemas: string;
  output?: string;
}

export interface MapCommandOptions {
  dataset: string;
  mappings: string;
  output?: string;
}

export interface CommandHandlers {
  anonymize(options: AnonymizeCommandOptions): Promise<void>;
  map(options: MapCommandOptions): Promise<void>;
}

/**
 * Builds the `idmap` command tree. Commander errors (unknown options, missing
 * arguments, --help) are thrown as CommanderError instead of exiting.
 */
export function createProgram(
  handlers: CommandHandlers,
  output?: OutputConfiguration,
): Command {
  const program = new Command()
    .name("idmap")
    .description("Rename SQL tables and columns with per-database mappings")
    .version(CLI_VERSION, "-v, --version")
    .exitOverride();

  if (output) {
    program.configureOutput(output);
  }

  program
    .command("anonymize")
    .description(
      "Replace the tables and columns of every schema in a mapping file with synthetic names",
    )
    .requiredOption("--schemas <file>", "mapping file holding the schemas")
    .option("-o, --output <file>", "where to write the mappings (default: --schemas)")
    .action(async (options: AnonymizeCommandOptions) => {
      await handlers.anonymize(options);
    });

  program
    .command("map")
    .description("Rewrite the query columns of a dataset with stored mappings")
    .requiredOption("--dataset <file>", "comma-delimited dataset with a header row")
    .requiredOption("--mappings <file>", "mapping file written by `anonymize`")
    .option("-o, --output <file>", "where to write the dataset (default: --dataset)")
    .action(async (options: MapCommandOptions) => {
      await handlers.map(options);
    });

  return program;
}
