import { readFile } from "node:fs/promises";
import path from "node:path";
import { homedir } from "node:os";
import { isMap, isScalar, parseDocument } from "yaml";
import { z } from "zod";
import { COMMAND_KEY } from "../types.js";
import type { WindowAttribute, WindowSpec } from "../types.js";
import { ConfigError } from "./errors.js";

export const DEFAULT_CONFIG_FILE = process.env.RAISENEXT_CONFIG || "~/.raisenext.json";

const aliasFileSchema = z.record(z.string(), z.record(z.string(), z.string()));

export type AliasFile = z.infer<typeof aliasFileSchema>;

export type SpecOverrides = Partial<Record<WindowAttribute | typeof COMMAND_KEY, string>>;

export function expandHome(file: string): string {
  if (file === "~") return homedir();
  if (file.startsWith("~/")) return path.join(homedir(), file.slice(2));
  return path.resolve(file);
}

/** JSON.parse keeps the last of two identical keys; the YAML AST keeps both. */
export function repeatedAlias(text: string): string | null {
  const doc = parseDocument(text, { uniqueKeys: false });
  if (!isMap(doc.contents)) return null;
  const seen = new Set<string>();
  for (const pair of doc.contents.items) {
    if (!isScalar(pair.key)) continue;
    const name = String(pair.key.value);
    if (seen.has(name)) return name;
    seen.add(name);
  }
  return null;
}

export async function readAliasFile(file: string): Promise<AliasFile> {
  const resolved = expandHome(file);
  let text: string;
  let data: unknown;
  try {
    text = await readFile(resolved, "utf-8");
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigError("unreadable", `Could not read config file ${resolved}`, resolved, {
      cause: error,
    });
  }

  const repeated = repeatedAlias(text);
  if (repeated !== null) {
    throw new ConfigError(
      "duplicate",
      `Alias "${repeated.toLowerCase()}" is defined more than once in ${resolved}`,
      resolved
    );
  }

  const parsed = aliasFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      "unreadable",
      `Config file ${resolved} must map each alias to an object of strings`,
      resolved
    );
  }
  return parsed.data;
}

/** Subcommand names; an alias named like one is only reachable through `run`. */
export const RESERVED_ALIASES = ["run", "windows", "aliases"] as const;

export function isReservedAlias(name: string): boolean {
  return RESERVED_ALIASES.some((reserved) => reserved === name.toLowerCase());
}

/** Aliases keyed by their lowercased name. */
export function foldAliases(aliases: AliasFile, file: string): Map<string, WindowSpec> {
  const folded = new Map<string, WindowSpec>();
  for (const [name, spec] of Object.entries(aliases)) {
    const key = name.toLowerCase();
    if (folded.has(key)) {
      throw new ConfigError("duplicate", `Alias "${key}" is defined more than once in ${file}`, file);
    }
    folded.set(key, spec);
  }
  return folded;
}

export async function resolveAlias(alias: string, file: string): Promise<WindowSpec> {
  const folded = foldAliases(await readAliasFile(file), file);
  const spec = folded.get(alias.toLowerCase());
  if (!spec) {
    throw new ConfigError("not-found", `Alias "${alias}" not found in ${file}`, file);
  }
  return spec;
}

/** Per-invocation values win over the alias's own. */
export function applyOverrides(spec: WindowSpec, overrides: SpecOverrides): WindowSpec {
  const result: Record<string, string> = { ...spec };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

export async function buildWindowSpec(
  alias: string | undefined,
  file: string,
  overrides: SpecOverrides
): Promise<WindowSpec> {
  const base = alias ? await resolveAlias(alias, file) : {};
  return applyOverrides(base, overrides);
}

export function describeSpec(spec: WindowSpec): string {
  return Object.entries(spec)
    .map(([key, value]) => (key === COMMAND_KEY ? `$ ${value}` : `${key}~"${value}"`))
    .join("  ");
}
