import type {
  Action,
  CommandRunner,
  MruStore,
  Window,
  WindowFocuser,
  WindowManagerQuery,
  WindowSpec,
} from "../types.js";
import { reconcile, promote } from "../core/mru.js";
import { selectAction } from "../core/cycle.js";

export interface RaiseNextDeps {
  store: MruStore;
  windows: WindowManagerQuery;
  focuser: WindowFocuser;
  runner: CommandRunner;
}

export interface RaiseNextOutcome {
  action: Action;
  /** Reconciled MRU order the decision was made against. */
  ordered: Window[];
  focused: Window | null;
  saved: boolean;
}

export async function orderedWindows(deps: Pick<RaiseNextDeps, "store" | "windows">): Promise<Window[]> {
  const stored = await deps.store.load();
  return reconcile(stored, deps.windows.listWindows());
}

/**
 * Launch the app, raise its most recent window, or step to its next window.
 * Only focus and advance touch the stored MRU order.
 */
export async function runRaiseNext(
  spec: WindowSpec,
  deps: RaiseNextDeps,
  options?: { dryRun?: boolean }
): Promise<RaiseNextOutcome> {
  const ordered = await orderedWindows(deps);
  const focused = deps.windows.focusedWindow();
  const action = selectAction(spec, ordered, focused);
  const outcome: RaiseNextOutcome = { action, ordered, focused, saved: false };

  if (options?.dryRun) return outcome;

  switch (action.kind) {
    case "launch":
      if (action.command) deps.runner.run(action.command);
      return outcome;
    case "noop":
      return outcome;
    case "focus":
    case "advance":
      deps.focuser.focus(action.window);
      await deps.store.save(promote(ordered, action.window));
      return { ...outcome, saved: true };
  }
}
