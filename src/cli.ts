#!/usr/bin/env node

import { Command } from "commander";
import { build, runCustomCommand, type BuildResult } from "./commands/build.js";
import { clean } from "./commands/clean.js";
import type { CommandError, CommandOptions } from "./commands/context.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import { plan } from "./commands/plan.js";
import { validateAll } from "./commands/validate.js";
import type { OutputFormat } from "./types/config.js";

type SharedFlags = {
  manifest?: string;
  config?: string;
  env?: string;
  profile?: string;
  component?: string[];
  format?: string;
  verbose?: boolean;
  maxConcurrency?: string;
  keepGoing?: boolean;
};

function usageError(message: string): never {
  console.error(message);
  process.exit(EXIT.INVALID_ARGS);
}

function parseFormat(value: string | undefined): OutputFormat | undefined {
  if (value === undefined || value === "human" || value === "jsonl") return value;
  return usageError(`--format must be human or jsonl, got "${value}"`);
}

function toOptions(flags: SharedFlags): CommandOptions {
  let maxConcurrency: number | undefined;
  if (flags.maxConcurrency !== undefined) {
    maxConcurrency = Number(flags.maxConcurrency);
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      usageError(`--max-concurrency must be a positive integer, got "${flags.maxConcurrency}"`);
    }
  }
  return {
    manifestPath: flags.manifest,
    configDir: flags.config,
    envName: flags.env,
    profile: flags.profile,
    components: flags.component,
    format: parseFormat(flags.format),
    verbose: flags.verbose,
    maxConcurrency,
    failurePolicy: flags.keepGoing ? "continue" : undefined,
  };
}

function reportError(error: CommandError, format: OutputFormat | undefined): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", ...error }) + "\n");
    return;
  }
  console.error(`error: ${error.message}`);
  for (const d of error.diagnostics ?? []) console.error(`  ${d.message}`);
}

function finishBuild(res: BuildResult, format: OutputFormat | undefined): void {
  if (res.ok) return;
  // A finished run has already logged its summary.
  if (res.report === undefined) reportError(res.error, format);
  process.exit(exitCodeFor(res.error.kind));
}

function withShared(command: Command): Command {
  return command
    .option("--manifest <path>", "Path to the application manifest (default: wab.yaml)")
    .option("--config <path>", "Settings directory holding base.yaml (default: the bundled one)")
    .option("--env <name>", "Config environment layered over base.yaml")
    .option("--profile <name>", "Build profile")
    .option("-c, --component <pattern...>", "Component name or glob pattern (repeatable)")
    .option("--format <format>", "Output format: human|jsonl")
    .option("-v, --verbose", "Stream command output");
}

const program = new Command();

program.name("wab").description("Incremental builder for multi-component WebAssembly applications").version("0.1.0");

withShared(program.command("build"))
  .description("Build the selected components in dependency order")
  .option("-j, --max-concurrency <n>", "Components building at the same time")
  .option("-k, --keep-going", "Keep building independent components after a failure")
  .action(async (flags: SharedFlags) => {
    const opts = toOptions(flags);
    finishBuild(await build(opts), opts.format);
  });

withShared(program.command("custom"))
  .description("Run a custom command of every selected component defining it")
  .argument("<name>", "Custom command name")
  .option("-j, --max-concurrency <n>", "Components running at the same time")
  .option("-k, --keep-going", "Keep running other components after a failure")
  .action(async (name: string, flags: SharedFlags) => {
    const opts = toOptions(flags);
    finishBuild(await runCustomCommand(name, opts), opts.format);
  });

withShared(program.command("clean"))
  .description("Remove generated and built artifacts of the selected components")
  .action(async (flags: SharedFlags) => {
    const opts = toOptions(flags);
    const res = await clean(opts);
    if (!res.ok) {
      reportError(res.error, opts.format);
      process.exit(exitCodeFor(res.error.kind));
    }
  });

withShared(program.command("plan"))
  .description("Show build order and staleness verdicts without running anything")
  .action(async (flags: SharedFlags) => {
    const opts = toOptions(flags);
    const res = await plan(opts);
    if (!res.ok) {
      reportError(res.error, opts.format);
      process.exit(exitCodeFor(res.error.kind));
    }
  });

withShared(program.command("validate"))
  .description("Validate settings and manifest")
  .action((flags: SharedFlags) => {
    const opts = toOptions(flags);
    const res = validateAll(opts);

    if (opts.format === "jsonl") {
      for (const d of res.warnings) process.stdout.write(JSON.stringify(d) + "\n");
    } else {
      for (const d of res.warnings) console.error(`warning: ${d.message}`);
    }

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
      } else {
        for (const err of res.errors) console.error(`error: ${err.message}`);
      }
      const planning = res.errors.some((e) => e.details?.kind === "planning");
      process.exit(planning ? EXIT.PLANNING_FAILED : EXIT.INVALID_CONFIG);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.BUILD_FAILED);
});
