import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import type { SourceHandle } from "../types";

export type PresetCatalog = ReadonlyMap<string, SourceHandle>;

export const DEFAULT_PRESETS_DIR = fileURLToPath(
  new URL("../../presets/", import.meta.url),
);

const PRESET_EXTENSIONS = [".yml", ".yaml"];
const PRESET_FILE_PREFIX = "pipeline_config_";

export function presetNameFromFile(fileName: string): string | undefined {
  const extension = PRESET_EXTENSIONS.find((candidate) =>
    fileName.endsWith(candidate),
  );
  if (!extension) {
    return undefined;
  }
  const stem = fileName.slice(0, -extension.length);
  const name = stem.startsWith(PRESET_FILE_PREFIX)
    ? stem.slice(PRESET_FILE_PREFIX.length)
    : stem;
  return name.length > 0 ? name : undefined;
}

export function createFileHandle(
  name: string,
  location: string,
  kind: SourceHandle["kind"] = "file",
): SourceHandle {
  return {
    id: kind === "preset" ? `preset:${name}` : location,
    name,
    kind,
    location,
    read: () => fs.readFile(location, "utf-8"),
  };
}

/**
 * Builds the catalog of built-in presets from a directory of YAML files.
 * `pipeline_config_fx-options.yml` and `fx-options.yml` both register
 * `fx-options`; two files claiming one name is an error.
 */
export async function loadPresetCatalog(
  directory: string = DEFAULT_PRESETS_DIR,
): Promise<PresetCatalog> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const catalog = new Map<string, SourceHandle>();

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (!entry.isFile()) {
      continue;
    }
    const name = presetNameFromFile(entry.name);
    if (!name) {
      continue;
    }
    const location = path.join(directory, entry.name);
    const existing = catalog.get(name);
    if (existing) {
      throw new Error(
        `Preset "${name}" is defined by both ${existing.location} and ${location}.`,
      );
    }
    catalog.set(name, createFileHandle(name, location, "preset"));
  }

  return catalog;
}

/** A catalog whose documents live in memory, keyed by preset name. */
export function createInMemoryCatalog(
  sources: Record<string, string>,
): PresetCatalog {
  return new Map(
    Object.entries(sources).map(([name, source]): [string, SourceHandle] => [
      name,
      {
        id: `preset:${name}`,
        name,
        kind: "preset",
        location: `memory:${name}`,
        read: async () => source,
      },
    ]),
  );
}
