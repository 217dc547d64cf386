import { spawn } from "node:child_process";
import chalk from "chalk";
import type { CommandRunner } from "../types.js";

export class ShellCommandRunner implements CommandRunner {
  run(command: string): void {
    const child = spawn(command, {
      shell: true,
      detached: true,
      stdio: "ignore",
    });
    child.on("error", (error) => {
      console.error(chalk.red(`Failed to launch "${command}": ${error.message}`));
    });
    // Let the CLI exit while the app keeps running
    child.unref();
  }
}
