import { COMMAND_KEY, WINDOW_ATTRIBUTES } from "../types.js";
import type { Window, WindowAttribute, WindowSpec } from "../types.js";

function isWindowAttribute(key: string): key is WindowAttribute {
  return WINDOW_ATTRIBUTES.some((attribute) => attribute === key);
}

export function matchKeys(spec: WindowSpec): string[] {
  return Object.keys(spec).filter((key) => key !== COMMAND_KEY);
}

/**
 * A window matches when, for every key of the window spec except `command`,
 * the window has that attribute and it contains the wanted value, ignoring
 * case. `{ wm_class: ".Firefox" }` matches "Navigator.Firefox".
 */
export function matches(window: Window, spec: WindowSpec): boolean {
  for (const key of matchKeys(spec)) {
    if (!isWindowAttribute(key)) return false;
    const wanted = spec[key].toLowerCase();
    if (!window[key].toLowerCase().includes(wanted)) return false;
  }
  return true;
}
