import { COMMAND_KEY } from "../types.js";
import type { Action, Window, WindowSpec } from "../types.js";
import { matches, matchKeys } from "./matcher.js";

function includesWindow(windows: Window[], window: Window | null): boolean {
  return window !== null && windows.some((w) => w.id === window.id);
}

/**
 * While cycling through an app, each window we switch to is promoted, so the
 * app's already-visited windows form a run at the head of the MRU order.
 * Returns the matching windows outside that run, in MRU order.
 */
export function unvisitedWindows(matching: Window[], ordered: Window[]): Window[] {
  const visited: Window[] = [];
  for (const w of ordered) {
    if (!includesWindow(matching, w)) break;
    visited.push(w);
  }
  return matching.filter((w) => !includesWindow(visited, w));
}

export function selectAction(
  spec: WindowSpec,
  ordered: Window[],
  focused: Window | null
): Action {
  const launch: Action = { kind: "launch", command: spec[COMMAND_KEY] || null };

  // Nothing to match on: the window spec is just a command
  if (matchKeys(spec).length === 0) return launch;
  if (ordered.length === 0) return launch;

  const matching = ordered.filter((w) => matches(w, spec));
  if (matching.length === 0) return launch;

  if (!includesWindow(matching, focused)) {
    return { kind: "focus", window: matching[0] };
  }

  if (matching.length === 1) {
    return { kind: "noop", window: matching[0] };
  }

  const unvisited = unvisitedWindows(matching, ordered);
  if (unvisited.length > 0) {
    return { kind: "advance", window: unvisited[0] };
  }
  // Every window has been visited once; wrap to the least recent
  return { kind: "advance", window: matching[matching.length - 1] };
}
