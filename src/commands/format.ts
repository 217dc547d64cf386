import chalk from "chalk";
import type { Action, Window } from "../types.js";

export function windowLabel(window: Window): string {
  return `${chalk.dim(window.id)} ${chalk.cyan(window.wm_class)} ${window.title}`;
}

export function actionLabel(action: Action): string {
  switch (action.kind) {
    case "launch":
      return action.command ? `Launched ${chalk.bold(action.command)}` : "Nothing to run";
    case "focus":
      return `Focused ${windowLabel(action.window)}`;
    case "advance":
      return `Next window ${windowLabel(action.window)}`;
    case "noop":
      return `Already focused ${windowLabel(action.window)}`;
  }
}
