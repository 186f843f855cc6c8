import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { Preset } from '../types/index.js';
import { ValidationError } from './errors.js';
import { compilePattern, parseOrThrow, presetFileSchema } from './validation.js';

/** Preset bundle shipped with the package */
export const DEFAULT_PRESETS_PATH = fileURLToPath(
  new URL('../presets/default-presets.json', import.meta.url)
);

/**
 * Load and validate a preset bundle file. Every rule pattern must compile
 * and preset ids must be unique, otherwise the whole file is rejected.
 */
export async function loadPresets(filePath: string = DEFAULT_PRESETS_PATH): Promise<Preset[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ValidationError(`Preset file not found: ${filePath}`);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(
      `Preset file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parsePresets(raw);
}

export function parsePresets(raw: unknown): Preset[] {
  const file = parseOrThrow(presetFileSchema, raw, 'preset file');
  const seen = new Set<string>();

  for (const preset of file.presets) {
    if (seen.has(preset.id)) {
      throw new ValidationError(`Duplicate preset id: ${preset.id}`);
    }
    seen.add(preset.id);

    const ruleIds = new Set<string>();
    for (const rule of preset.rules) {
      if (ruleIds.has(rule.id)) {
        throw new ValidationError(`Duplicate rule id ${rule.id} in preset ${preset.id}`);
      }
      ruleIds.add(rule.id);
      compilePattern(rule.pattern);
    }
  }

  return file.presets.map(freezePreset);
}

/**
 * Deep-frozen copy: the bundle, its rule list and every rule
 */
export function freezePreset(preset: Preset): Preset {
  return Object.freeze({
    ...preset,
    rules: Object.freeze(preset.rules.map((rule) => Object.freeze({ ...rule }))),
  });
}
