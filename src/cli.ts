#!/usr/bin/env node

import { Command } from "commander";
import { doctor } from "./commands/doctor.js";
import { EXIT } from "./commands/exit-codes.js";
import { parseFormat, type CommandOutput } from "./commands/format.js";
import { plan } from "./commands/plan.js";
import { reset } from "./commands/reset.js";
import { listRules } from "./commands/rules.js";
import { run } from "./commands/run.js";
import { status } from "./commands/status.js";
import { validate } from "./commands/validate.js";
import { createLogger } from "./logger.js";

type CommonOpts = { config: string; env?: string; format: string };

const logger = createLogger("phasectl");

function emit(out: CommandOutput): void {
  for (const line of out.stdout) process.stdout.write(line + "\n");
  for (const line of out.stderr) process.stderr.write(line + "\n");
  process.exitCode = out.exitCode;
}

function common(opts: CommonOpts) {
  return { configDir: opts.config, env: opts.env, format: parseFormat(opts.format), logger };
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory", process.env.PHASECTL_CONFIG ?? "config")
    .option("--env <name>", "Environment overlay ({config}/{name}.yaml)", process.env.PHASECTL_ENV)
    .option("--format <format>", "Output format: human|json|jsonl", "human");
}

const program = new Command();

program
  .name("phasectl")
  .description("Ordered, idempotent installation phases against a live container deployment")
  .version("0.1.0");

withCommonOptions(program.command("run"))
  .description("Run phases in dependency order, skipping what the journal shows is done")
  .option("--from <id>", "Start at this phase and run everything after it")
  .option("--only <id>", "Run a single phase")
  .action(async (opts: CommonOpts & { from?: string; only?: string }) => {
    const controller = new AbortController();
    let interrupts = 0;
    const onSignal = (signal: NodeJS.Signals) => {
      interrupts++;
      if (interrupts > 1) process.exit(EXIT.CANCELLED);
      logger.warn(`received ${signal}; finishing the current phase, then stopping`);
      controller.abort();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    try {
      emit(await run({ ...common(opts), from: opts.from, only: opts.only, signal: controller.signal }));
    } finally {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    }
  });

withCommonOptions(program.command("plan"))
  .description("Print the resolved phase order without contacting the target")
  .option("--from <id>", "Start at this phase")
  .option("--only <id>", "A single phase")
  .action(async (opts: CommonOpts & { from?: string; only?: string }) => {
    emit(await plan({ ...common(opts), from: opts.from, only: opts.only }));
  });

withCommonOptions(program.command("status"))
  .description("Show the installation journal")
  .action(async (opts: CommonOpts) => {
    emit(await status(common(opts)));
  });

withCommonOptions(program.command("reset"))
  .description("Clear journal entries so phases are evaluated again")
  .option("--phase <id>", "Clear only this phase")
  .action(async (opts: CommonOpts & { phase?: string }) => {
    emit(await reset({ ...common(opts), phase: opts.phase }));
  });

withCommonOptions(program.command("validate"))
  .description("Validate config, patch rules and the phase graph")
  .action(async (opts: CommonOpts) => {
    emit(await validate(common(opts)));
  });

withCommonOptions(program.command("rules"))
  .description("List declared patch rules")
  .option("--scope <tag>", "Only rules with this scope tag")
  .action(async (opts: CommonOpts & { scope?: string }) => {
    emit(await listRules({ ...common(opts), scope: opts.scope }));
  });

withCommonOptions(program.command("doctor"))
  .description("Report target liveness and health")
  .action(async (opts: CommonOpts) => {
    emit(await doctor(common(opts)));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.CONFIG_INVALID);
});
