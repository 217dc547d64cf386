#!/usr/bin/env node

import { Command, Option } from "commander";
import { DEFAULT_CONFIG_FILE } from "./core/config.js";
import { runCommand } from "./commands/run.js";
import { windowsCommand } from "./commands/windows.js";
import { aliasesCommand } from "./commands/aliases.js";

const program = new Command();

program
  .name("raisenext")
  .description("Launch an app, raise it, or cycle to its next window")
  .version("0.1.0");

program
  .command("run", { isDefault: true })
  .argument("[alias]", "Window spec alias from the config file")
  .description("Launch, focus, or step to the next window of an app")
  .option("-i, --id <id>", "window id to look for, e.g. 0x0180000b")
  .option("-d, --desktop <desktop>", "desktop to look for windows on, e.g. 1")
  .option("-p, --pid <pid>", "process id to look for, e.g. 3384")
  .option("-w, --wm-class <class>", "WM_CLASS to look for, e.g. Navigator.Firefox")
  .addOption(new Option("--wm_class <class>", "same as --wm-class").hideHelp())
  .option("-m, --machine <machine>", "client machine name to look for")
  .option("-t, --title <title>", "window title to look for")
  .option("-c, --command <command>", "command that launches the app when no window matches")
  .option("-f, --file <path>", "config file with window spec aliases", DEFAULT_CONFIG_FILE)
  .option("-n, --dry-run", "print the decision without acting on it")
  .option("-v, --verbose", "print the window spec and the window order")
  .action(runCommand);

program
  .command("windows")
  .description("List open windows, most recently used first")
  .option("--json", "print as JSON")
  .action(windowsCommand);

program
  .command("aliases")
  .description("List the aliases defined in the config file")
  .option("-f, --file <path>", "config file with window spec aliases", DEFAULT_CONFIG_FILE)
  .option("--json", "print as JSON")
  .action(aliasesCommand);

await program.parseAsync();
