export const WINDOW_ATTRIBUTES = [
  "id",
  "desktop",
  "pid",
  "wm_class",
  "machine",
  "title",
] as const;

export type WindowAttribute = (typeof WINDOW_ATTRIBUTES)[number];

export interface Window {
  id: string;
  desktop: string;
  pid: string;
  wm_class: string;
  machine: string;
  title: string;
}

/**
 * Attribute name → required substring. The `command` key is what to run
 * when no window matches; it never takes part in matching.
 */
export type WindowSpec = Readonly<Record<string, string>>;

export const COMMAND_KEY = "command";

export type Action =
  | { kind: "launch"; command: string | null }
  | { kind: "focus"; window: Window }
  | { kind: "noop"; window: Window }
  | { kind: "advance"; window: Window };

export interface MruStore {
  load(): Promise<Window[]>;
  save(windows: Window[]): Promise<void>;
}

// Collaborators at the window-manager / process boundary

export interface WindowManagerQuery {
  listWindows(): Window[];
  focusedWindow(): Window | null;
}

export interface WindowFocuser {
  focus(window: Window): boolean;
}

export interface CommandRunner {
  run(command: string): void;
}
