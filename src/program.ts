import { Command, CommanderError } from "commander";
import chalk from "chalk";
import * as fs from "fs";
import { ConfigError, loadConfig } from "./config.js";
import { runIconGenerator } from "./icons.js";
import { createConsoleLogger } from "./logger.js";
import { errorMessage, isRecord } from "./shared.js";

export interface CliOptions {
  dir?: string;
  config?: string;
  quiet?: boolean;
}

function readPackageVersion(): string {
  const raw: unknown = JSON.parse(
    fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  return isRecord(raw) && typeof raw.version === "string" ? raw.version : "0.0.0";
}

/** Flags win over config values, which win over built-in defaults. */
export async function runCli(opts: CliOptions, cwd: string): Promise<number> {
  try {
    const { config } = loadConfig(cwd, opts.config);
    const logger = createConsoleLogger({ quiet: opts.quiet ?? config.quiet });
    const result = await runIconGenerator({
      cwd,
      iconsDir: opts.dir ?? config.iconsDir,
      logger,
    });
    return result.exitCode;
  } catch (err) {
    const prefix = err instanceof ConfigError ? "" : "Icon generation failed: ";
    console.error(chalk.red(`${prefix}${errorMessage(err)}`));
    return 1;
  }
}

export function buildProgram(onRun: (opts: CliOptions) => Promise<void>): Command {
  return new Command()
    .name("generate-pwa-icons")
    .description(
      "Generate favicon, touch and maskable PWA icons from static/icons/icon-512x512.png"
    )
    .version(readPackageVersion())
    .option("-d, --dir <path>", "Icons directory (default: static/icons)")
    .option("-c, --config <path>", "Path to a repolizer.config.json file")
    .option("--quiet", "Suppress per-icon progress output")
    .exitOverride()
    .action(onRun);
}

export async function main(argv: readonly string[], cwd = process.cwd()): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(async (opts) => {
    exitCode = await runCli(opts, cwd);
  });

  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
