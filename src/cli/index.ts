#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { loadConfig, type LayerproofConfig } from "../config/config.js";
import {
  createLogger,
  stderrLineSink,
  type LogLevel,
  type Logger,
} from "../logging/logger.js";
import { runBuildCommand } from "./build-command.js";
import { parseHandlerName, runInvokeCommand } from "./invoke-command.js";
import { parseFormat, type CommandResult } from "./output.js";
import { runVerifyCommand } from "./verify-command.js";

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly workRoot?: string;
  readonly python?: string;
  readonly catalog?: string;
  readonly layerRoot?: string;
}

interface BuildCliOptions {
  readonly package: string;
  readonly runtime: string;
  readonly arch: string;
  readonly bucket?: string;
  readonly storeDir?: string;
  readonly format: string;
}

interface VerifyCliOptions {
  readonly package?: string;
  readonly importName?: string;
  readonly expectedVersion?: string;
  readonly runtime?: string;
  readonly arch?: string;
  readonly format: string;
}

interface InvokeCliOptions {
  readonly dryRun?: boolean;
  readonly storeDir?: string;
  readonly format: string;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("layerproof")
  .version(toolVersion)
  .option("--verbose", "Verbose logging")
  .option("--quiet", "Only log warnings and errors")
  .option("--work-root <path>", "Ephemeral root for staging")
  .option("--python <path>", "Python interpreter used for pip and probes")
  .option("--catalog <path>", "Catalog of supported packages")
  .option("--layer-root <path>", "Directory attached layers are mounted at");

program
  .command("build")
  .description("Build a layer and publish it")
  .requiredOption("--package <name>", "Package to install")
  .requiredOption("--runtime <id>", "Target runtime, e.g. python3.13")
  .requiredOption("--arch <arch>", "Target architecture (x86_64|arm64)")
  .option("--bucket <name>", "Destination S3 bucket")
  .option("--store-dir <path>", "Publish to a local directory store")
  .option("--format <format>", "Output format (json|md)", "md")
  .action(async (options: BuildCliOptions) => {
    await runAction(async (config, logger) =>
      runBuildCommand(
        {
          packageName: options.package,
          runtime: options.runtime,
          architecture: options.arch,
          bucket: options.bucket,
          storeDir: options.storeDir,
          format: parseFormat(options.format),
        },
        config,
        logger,
        toolVersion,
      ),
    );
  });

program
  .command("verify")
  .description("Check the attached layer against an expected identity")
  .option("--package <name>", "Expected package name")
  .option("--import-name <name>", "Module name to import")
  .option("--expected-version <version>", "Expected package version")
  .option("--runtime <id>", "Expected runtime")
  .option("--arch <arch>", "Expected architecture")
  .option("--format <format>", "Output format (json|md)", "md")
  .action(async (options: VerifyCliOptions) => {
    await runAction(async (config, logger) =>
      runVerifyCommand(
        {
          packageName: options.package,
          importName: options.importName,
          version: options.expectedVersion,
          runtime: options.runtime,
          architecture: options.arch,
          format: parseFormat(options.format),
        },
        config,
        logger,
        toolVersion,
      ),
    );
  });

program
  .command("invoke")
  .description("Replay a custom resource event through a handler")
  .argument("<handler>", "builder or verifier")
  .argument("<event>", "Path to the event JSON")
  .option("--dry-run", "Print the callback instead of sending it")
  .option("--store-dir <path>", "Publish to a local directory store")
  .option("--format <format>", "Output format (json|md)", "json")
  .action(
    async (handler: string, eventPath: string, options: InvokeCliOptions) => {
      await runAction(async (config, logger) =>
        runInvokeCommand(
          {
            handler: parseHandlerName(handler),
            eventPath,
            dryRun: Boolean(options.dryRun),
            storeDir: options.storeDir,
            format: parseFormat(options.format),
          },
          config,
          logger,
          toolVersion,
        ),
      );
    },
  );

async function runAction(
  action: (config: LayerproofConfig, logger: Logger) => Promise<CommandResult>,
): Promise<void> {
  try {
    const globals = program.opts<GlobalOptions>();
    const config = resolveConfig(globals);
    const logger = createLogger({
      level: resolveLogLevel(globals, config.logLevel),
      sink: stderrLineSink,
    });
    const result = await action(config, logger);
    await writeStdout(result.output + "\n");
    if (result.report.status === "FAILED") {
      process.exitCode = 2;
    }
  } catch (error) {
    await writeError(error);
    process.exitCode = 1;
  }
}

function resolveConfig(globals: GlobalOptions): LayerproofConfig {
  return loadConfig({
    ...process.env,
    LAYERPROOF_WORK_ROOT: globals.workRoot ?? process.env.LAYERPROOF_WORK_ROOT,
    LAYERPROOF_PYTHON: globals.python ?? process.env.LAYERPROOF_PYTHON,
    LAYERPROOF_CATALOG: globals.catalog ?? process.env.LAYERPROOF_CATALOG,
    LAYERPROOF_LAYER_ROOT:
      globals.layerRoot ?? process.env.LAYERPROOF_LAYER_ROOT,
  });
}

function resolveLogLevel(globals: GlobalOptions, fallback: LogLevel): LogLevel {
  if (globals.verbose) {
    return "debug";
  }
  if (globals.quiet) {
    return "warn";
  }
  return fallback;
}

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

const argv = [...process.argv];
const separatorIndex = argv.indexOf("--");
if (separatorIndex !== -1) {
  argv.splice(separatorIndex, 1);
}

await program.parseAsync(argv);
