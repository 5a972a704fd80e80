#!/usr/bin/env node

import { Command, Option } from "commander";
import { IiifDimensionProvider, PaginationCache } from "./dimension-provider.ts";
import { LOG_LEVELS, LOG_LEVEL_ENV, createLogger, parseLogLevel } from "./logger.ts";
import { runBoundaryCheck, runPageStatistics } from "./page-check.ts";

interface LoggingOptions {
  logLevel?: string;
  logFile?: string;
}

interface CheckOptions extends LoggingOptions {
  output: string;
  gitVersion?: string;
  iiifGallicaV3: boolean;
  random: boolean;
}

const program = new Command();

program
  .name("page-bbox-qa")
  .description("Quality checks for OCR page layout geometry")
  .showHelpAfterError();

const logLevelOption = () =>
  new Option("--log-level <level>", `Logging level (default: $${LOG_LEVEL_ENV} or INFO)`).choices([...LOG_LEVELS]);

// Parsed inside the actions so a bad environment value reaches the error handler below.
function createCommandLogger({ logLevel, logFile }: LoggingOptions) {
  return createLogger({ level: parseLogLevel(logLevel ?? process.env[LOG_LEVEL_ENV]), logFile });
}

program
  .command("check")
  .description("Check that lines, paragraphs and regions of every page lie within the page image")
  .argument("<input>", "Page JSONL file (.jsonl, .jsonl.bz2 or .jsonl.gz) or a directory of *pages.jsonl files")
  .option("--output <path>", "Output JSONL file, or - for stdout", "output.jsonl")
  .option("--git-version <version>", "Version tag added to every page report")
  .option("--iiif-gallica-v3", "Rewrite Gallica IIIF links to the presentation v3 server", false)
  .option("--random", "Process page files in random order", false)
  .option("--log-file <path>", "Also append log lines to this file")
  .addOption(logLevelOption())
  .action(async (input: string, options: CheckOptions) => {
    const logger = createCommandLogger(options);
    logger.info(`Options: ${JSON.stringify({ input, ...options })}`);

    const { totals, failedPages } = await runBoundaryCheck(
      {
        inputPath: input,
        outputPath: options.output,
        gitVersion: options.gitVersion,
        patchGallicaV3: options.iiifGallicaV3,
        random: options.random,
      },
      {
        dimensionProvider: new IiifDimensionProvider({ cache: new PaginationCache(), logger }),
        logger,
      },
    );

    logger.info(`Finished processing ${totals.total_pages} page(s), ${failedPages} skipped.`);
  });

program
  .command("stats")
  .description("Compute layout statistics for a single page JSON file")
  .argument("<input>", "Page JSON file")
  .argument("<output>", "Output JSONL file, or - for stdout")
  .option("--log-file <path>", "Also append log lines to this file")
  .addOption(logLevelOption())
  .action(async (input: string, output: string, options: LoggingOptions) => {
    const logger = createCommandLogger(options);
    await runPageStatistics(input, output, { logger });
  });

program.action(() => {
  program.outputHelp();
});

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
