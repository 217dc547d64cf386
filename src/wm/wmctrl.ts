import { execFileSync } from "node:child_process";
import type { Window, WindowFocuser, WindowManagerQuery } from "../types.js";

const LIST_LINE = /^(0x[0-9a-fA-F]+)\s+(-?\d+)\s+(\d+)\s+(\S+)\s+(\S+)(?: (.*))?$/;
const ACTIVE_LINE = /window id # (0x[0-9a-fA-F]+)/;

/** wmctrl pads ids to 8 hex digits, xprop doesn't. */
export function normalizeWindowId(raw: string): string {
  const value = parseInt(raw, 16);
  return `0x${value.toString(16).padStart(8, "0")}`;
}

export function parseWindowList(output: string): Window[] {
  const windows: Window[] = [];
  for (const line of output.split("\n")) {
    const match = line.match(LIST_LINE);
    if (!match) continue;
    const [, id, desktop, pid, wmClass, machine, title] = match;
    windows.push({
      id: normalizeWindowId(id),
      desktop,
      pid,
      wm_class: wmClass,
      machine,
      title: title ?? "",
    });
  }
  return windows;
}

export function parseActiveWindowId(output: string): string | null {
  const match = output.match(ACTIVE_LINE);
  if (!match) return null;
  const id = normalizeWindowId(match[1]);
  return id === normalizeWindowId("0x0") ? null : id;
}

function exec(file: string, args: string[]): string | null {
  try {
    return execFileSync(file, args, {
      encoding: "utf-8",
      stdio: ["pipe", "pipe", "pipe"],
    });
  } catch {
    return null;
  }
}

export class WmctrlWindowManager implements WindowManagerQuery, WindowFocuser {
  listWindows(): Window[] {
    const output = exec("wmctrl", ["-l", "-p", "-x"]);
    return output ? parseWindowList(output) : [];
  }

  focusedWindow(): Window | null {
    const output = exec("xprop", ["-root", "_NET_ACTIVE_WINDOW"]);
    const id = output ? parseActiveWindowId(output) : null;
    if (!id) return null;
    return this.listWindows().find((w) => w.id === id) ?? null;
  }

  focus(window: Window): boolean {
    return exec("wmctrl", ["-i", "-a", window.id]) !== null;
  }
}
