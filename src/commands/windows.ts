import chalk from "chalk";
import { createFileMruStore } from "../core/mru.js";
import { orderedWindows } from "../focus/orchestrator.js";
import { WmctrlWindowManager } from "../wm/wmctrl.js";
import { windowLabel } from "./format.js";

export async function windowsCommand(options?: { json?: boolean }): Promise<void> {
  const wm = new WmctrlWindowManager();
  const windows = await orderedWindows({ store: createFileMruStore(), windows: wm });

  if (options?.json) {
    console.log(JSON.stringify(windows, null, 2));
    return;
  }

  if (windows.length === 0) {
    console.log(chalk.dim("No windows found (is wmctrl installed?)"));
    return;
  }

  const focused = wm.focusedWindow();
  for (let i = 0; i < windows.length; i++) {
    const w = windows[i];
    const idx = chalk.dim(`${(i + 1).toString().padStart(2)}`);
    const marker = focused?.id === w.id ? chalk.green("*") : " ";
    console.log(`${marker} ${idx}  ${windowLabel(w)}`);
  }
}
