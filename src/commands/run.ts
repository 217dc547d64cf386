import chalk from "chalk";
import type { Command } from "commander";
import { buildWindowSpec, describeSpec } from "../core/config.js";
import type { SpecOverrides } from "../core/config.js";
import { ConfigError, StorageWriteError } from "../core/errors.js";
import { createFileMruStore } from "../core/mru.js";
import { runRaiseNext } from "../focus/orchestrator.js";
import { WmctrlWindowManager } from "../wm/wmctrl.js";
import { ShellCommandRunner } from "../wm/launcher.js";
import { actionLabel, windowLabel } from "./format.js";

export interface RunOptions {
  id?: string;
  desktop?: string;
  pid?: string;
  wmClass?: string;
  /** Underscore spelling, kept so existing hotkey bindings keep working. */
  wm_class?: string;
  machine?: string;
  title?: string;
  command?: string;
  file: string;
  dryRun?: boolean;
  verbose?: boolean;
}

export const ID_CONFLICT_MESSAGE =
  "A window id already identifies one window; --id can't be combined with other window options";

export function hasIdConflict(options: RunOptions): boolean {
  const { id, desktop, pid, machine, title } = options;
  const wmClass = options.wmClass ?? options.wm_class;
  return id !== undefined && [desktop, pid, wmClass, machine, title].some((v) => v !== undefined);
}

export function specOverrides(options: RunOptions): SpecOverrides {
  return {
    id: options.id,
    desktop: options.desktop,
    pid: options.pid,
    wm_class: options.wmClass ?? options.wm_class,
    machine: options.machine,
    title: options.title,
    command: options.command,
  };
}

export async function runCommand(
  alias: string | undefined,
  options: RunOptions,
  command: Command
): Promise<void> {
  if (hasIdConflict(options)) {
    command.error(ID_CONFLICT_MESSAGE);
  }

  const wm = new WmctrlWindowManager();

  try {
    const spec = await buildWindowSpec(alias, options.file, specOverrides(options));

    if (options.verbose) {
      console.log(chalk.dim(`  Spec: ${describeSpec(spec) || "(empty)"}`));
    }

    const outcome = await runRaiseNext(
      spec,
      { store: createFileMruStore(), windows: wm, focuser: wm, runner: new ShellCommandRunner() },
      { dryRun: options.dryRun }
    );

    if (options.verbose) {
      for (const w of outcome.ordered) {
        const marker = outcome.focused?.id === w.id ? chalk.green("*") : " ";
        console.log(`  ${marker} ${windowLabel(w)}`);
      }
    }

    const prefix = options.dryRun ? chalk.yellow("(dry run) ") : "";
    console.log(chalk.dim(`${prefix}${actionLabel(outcome.action)}`));
  } catch (error) {
    if (error instanceof ConfigError || error instanceof StorageWriteError) {
      console.error(chalk.red(error.message));
      process.exit(1);
    }
    throw error;
  }
}
