import type { Window } from "../src/types.js";

export function makeWindow(id: string, overrides: Partial<Window> = {}): Window {
  return {
    id,
    desktop: "0",
    pid: "1000",
    wm_class: "xterm.XTerm",
    machine: "workstation",
    title: `window ${id}`,
    ...overrides,
  };
}

export function ids(windows: Window[]): string[] {
  return windows.map((w) => w.id);
}
