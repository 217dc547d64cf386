import chalk from "chalk";
import { describeSpec, foldAliases, isReservedAlias, readAliasFile } from "../core/config.js";
import { ConfigError } from "../core/errors.js";
import type { WindowSpec } from "../types.js";

async function loadAliases(file: string): Promise<Map<string, WindowSpec>> {
  try {
    return foldAliases(await readAliasFile(file), file);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(error.message));
      process.exit(1);
    }
    throw error;
  }
}

export async function aliasesCommand(options: { file: string; json?: boolean }): Promise<void> {
  const aliases = await loadAliases(options.file);

  if (options.json) {
    console.log(JSON.stringify(Object.fromEntries(aliases), null, 2));
    return;
  }

  if (aliases.size === 0) {
    console.log(chalk.dim(`No aliases defined in ${options.file}`));
    return;
  }

  const names = [...aliases.keys()].sort((a, b) => a.localeCompare(b));
  for (const name of names) {
    const spec = aliases.get(name) ?? {};
    console.log(`${chalk.bold(name.padEnd(16))} ${chalk.dim(describeSpec(spec))}`);
    if (isReservedAlias(name)) {
      console.log(chalk.yellow(`  "${name}" is also a subcommand; call it as \`raisenext run ${name}\``));
    }
  }
}
