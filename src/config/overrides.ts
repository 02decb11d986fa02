/**
 * Coefficient Overrides Manager
 * Persists tuned coefficient values to a JSON file that is merged over
 * DEFAULT_COEFFICIENTS when a run is configured
 */

import { readFileSync, writeFileSync, existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { Coefficients, DeepReadonly } from '../core/types.js';
import { DEFAULT_COEFFICIENTS, cloneCoefficients, resolveCoefficients } from '../core/coefficients.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Path to overrides file (relative to project root)
const OVERRIDES_PATH = resolve(__dirname, '../../config/coefficient-overrides.json');

// ============================================================================
// Types
// ============================================================================

const CoefficientOverrideSchema = z.object({
  path: z.string().min(1),
  oldValue: z.number().nullable(),
  newValue: z.number(),
  appliedAt: z.string(),
  source: z.string(),
  rationale: z.string().optional(),
});

const OverridesFileSchema = z.object({
  version: z.number().int(),
  lastModified: z.string(),
  overrides: z.array(CoefficientOverrideSchema),
});

export type CoefficientOverride = z.infer<typeof CoefficientOverrideSchema>;
export type OverridesFile = z.infer<typeof OverridesFileSchema>;

function emptyOverrides(): OverridesFile {
  return {
    version: 1,
    lastModified: new Date().toISOString(),
    overrides: [],
  };
}

// ============================================================================
// Load/Save Functions
// ============================================================================

/**
 * Load overrides from file. A missing or unreadable file yields no overrides.
 */
export function loadOverrides(filePath: string = OVERRIDES_PATH): OverridesFile {
  try {
    if (existsSync(filePath)) {
      const parsed = OverridesFileSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
      if (parsed.success) return parsed.data;
      console.warn('[ConfigOverrides] Ignoring malformed overrides file:', parsed.error.message);
    }
  } catch (error) {
    console.warn('[ConfigOverrides] Failed to load overrides:', error);
  }

  return emptyOverrides();
}

export function saveOverrides(data: OverridesFile, filePath: string = OVERRIDES_PATH): boolean {
  try {
    const stamped = { ...data, lastModified: new Date().toISOString() };
    writeFileSync(filePath, JSON.stringify(stamped, null, 2), 'utf-8');
    console.log('[ConfigOverrides] Saved to', filePath);
    return true;
  } catch (error) {
    console.error('[ConfigOverrides] Failed to save:', error);
    return false;
  }
}

/**
 * Add (or replace) the override for a dotted coefficient path, e.g.
 * `economy.extractionEfficiency`. Unknown paths are rejected.
 */
export function addOverride(
  override: Omit<CoefficientOverride, 'appliedAt' | 'oldValue'>,
  filePath: string = OVERRIDES_PATH
): boolean {
  const oldValue = getCoefficient(DEFAULT_COEFFICIENTS, override.path);
  if (oldValue === undefined) {
    console.warn(`[ConfigOverrides] Unknown coefficient path: ${override.path}`);
    return false;
  }

  const data = loadOverrides(filePath);
  data.overrides = data.overrides.filter((o) => o.path !== override.path);
  data.overrides.push({
    ...override,
    oldValue,
    appliedAt: new Date().toISOString(),
  });

  return saveOverrides(data, filePath);
}

export function removeOverride(path: string, filePath: string = OVERRIDES_PATH): boolean {
  const data = loadOverrides(filePath);
  const initialLength = data.overrides.length;
  data.overrides = data.overrides.filter((o) => o.path !== path);

  if (data.overrides.length < initialLength) {
    return saveOverrides(data, filePath);
  }
  return false;
}

export function clearOverrides(filePath: string = OVERRIDES_PATH): boolean {
  return saveOverrides(emptyOverrides(), filePath);
}

/**
 * Apply overrides on top of a coefficient set and validate the result.
 * Throws ConfigurationError when an override pushes a value out of range.
 */
export function applyOverrides(
  base: DeepReadonly<Coefficients> = DEFAULT_COEFFICIENTS,
  overrides: readonly CoefficientOverride[] = loadOverrides().overrides
): DeepReadonly<Coefficients> {
  const coefficients = cloneCoefficients(base);

  for (const override of overrides) {
    if (setCoefficient(coefficients, override.path, override.newValue)) {
      console.log(`[ConfigOverrides] Applied: ${override.path} = ${override.newValue}`);
    } else {
      console.warn(`[ConfigOverrides] Skipped unknown path: ${override.path}`);
    }
  }

  return resolveCoefficients(coefficients);
}

export function getOverridesPath(): string {
  return OVERRIDES_PATH;
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getCoefficient(coefficients: DeepReadonly<Coefficients>, path: string): number | undefined {
  let current: unknown = coefficients;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return typeof current === 'number' ? current : undefined;
}

function setCoefficient(coefficients: Coefficients, path: string, value: number): boolean {
  const parts = path.split('.');
  const leaf = parts.pop();
  let current: unknown = coefficients;

  for (const part of parts) {
    if (!isRecord(current)) return false;
    current = current[part];
  }

  if (leaf === undefined || !isRecord(current) || typeof current[leaf] !== 'number') return false;
  current[leaf] = value;
  return true;
}
