#!/usr/bin/env node
import { spawnSync } from "node:child_process";
import process from "node:process";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { FLASH_TTL_MS } from "./app/flash.js";
import { AUTO_REFRESH_INTERVAL_MS, SessionApp } from "./app/session-app.js";
import { SessionController } from "./app/session-controller.js";
import type { CliArgs, RuntimeConfig } from "./config.js";
import { TmuxCliExecutor } from "./tmux/cli-executor.js";
import { runSessionTui } from "./tui/session-tui.js";
import { createLogger, FileLogger, type Logger } from "./util/file-logger.js";

const parseCliArgs = async (): Promise<CliArgs> => {
  const argv = await yargs(hideBin(process.argv))
    .scriptName("muxtree")
    .option("logo", {
      type: "boolean",
      default: true,
      describe: "Show the host name banner (disable with --no-logo)"
    })
    .strict()
    .help()
    .parseAsync();

  return { logo: argv.logo };
};

const attach = (tmux: TmuxCliExecutor, target: string, logger: Logger): number => {
  const command = tmux.attachCommand(target);
  logger.log("attaching", command.file, command.args.join(" "));
  const result = spawnSync(command.file, command.args, { stdio: "inherit" });
  if (result.error) {
    logger.error("attach failed", result.error);
    console.error(`muxtree: unable to run ${command.file}: ${result.error.message}`);
    return 1;
  }
  return result.status ?? 1;
};

const main = async (): Promise<void> => {
  const args = await parseCliArgs();
  const config: RuntimeConfig = {
    showLogo: args.logo,
    tickIntervalMs: 250,
    refreshIntervalMs: AUTO_REFRESH_INTERVAL_MS,
    flashTtlMs: FLASH_TTL_MS,
    debugLogPath: process.env.MUXTREE_DEBUG_LOG
  };
  const logger = createLogger(config.debugLogPath);
  if (logger instanceof FileLogger) {
    logger.log(`Debug log file: ${logger.location}`);
  }

  const tmux = new TmuxCliExecutor({ logger });
  if (!(await tmux.isAvailable())) {
    console.error("muxtree: tmux is not installed or not in PATH");
    process.exit(1);
  }

  const app = await SessionApp.create({
    tmux,
    logger,
    refreshIntervalMs: config.refreshIntervalMs,
    flashTtlMs: config.flashTtlMs
  });
  const controller = new SessionController(app);
  const outcome = await runSessionTui(app, controller, {
    showLogo: config.showLogo,
    tickIntervalMs: config.tickIntervalMs
  });

  if (outcome.type === "attach") {
    process.exit(attach(tmux, outcome.target, logger));
  }
};

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
