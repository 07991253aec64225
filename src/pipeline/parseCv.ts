import { UpstreamUnavailableError, describeError } from '../errors';
import { LlmClient } from '../llm/client';
import { withTimeout } from '../util/timeout';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const CV_KEYS = [
  'name',
  'email',
  'phone',
  'summary',
  'skills',
  'experience',
  'education',
  'projects',
  'certifications',
  'interests',
] as const;

const LIST_KEYS = new Set<string>(['skills', 'experience', 'education', 'projects', 'certifications', 'interests']);

const ENTRY_KEYS: Partial<Record<string, readonly string[]>> = {
  experience: ['title', 'company', 'duration', 'description'],
  education: ['degree', 'institution', 'year', 'details'],
  projects: ['name', 'description', 'technologies', 'url'],
  certifications: ['name', 'issuer', 'year'],
};

const toText = (value: unknown): string | null => {
  if (typeof value === 'string') {
    return value.trim() || null;
  }
  return typeof value === 'number' ? String(value) : null;
};

const toTextList = (value: unknown): string[] =>
  Array.isArray(value) ? value.map(toText).filter((item): item is string => item !== null) : [];

const normalizeEntry = (keys: readonly string[], entry: unknown): Record<string, unknown> => {
  const source = isRecord(entry) ? entry : {};
  return Object.fromEntries(
    keys.map((key) => [key, key === 'technologies' ? toTextList(source[key]) : toText(source[key])]),
  );
};

/**
 * Coerces model output into the CV field shape: nulls for missing scalars,
 * empty arrays for missing lists, and only the known keys. The record store
 * validates the result.
 */
export const normalizeCvFields = (raw: unknown, nameOverride?: string): Record<string, unknown> => {
  const source = isRecord(raw) ? raw : {};
  const fields: Record<string, unknown> = {};

  for (const key of CV_KEYS) {
    const entryKeys = ENTRY_KEYS[key];

    if (entryKeys) {
      const value = source[key];
      fields[key] = Array.isArray(value) ? value.map((entry) => normalizeEntry(entryKeys, entry)) : [];
    } else if (LIST_KEYS.has(key)) {
      fields[key] = toTextList(source[key]);
    } else {
      fields[key] = toText(source[key]);
    }
  }

  const name = nameOverride?.trim();
  if (name) {
    fields.name = name;
  }

  return fields;
};

export const parseCv = async (
  llm: LlmClient,
  cvText: string,
  { timeoutMs, nameOverride }: { timeoutMs: number; nameOverride?: string },
): Promise<Record<string, unknown>> => {
  let raw: unknown;

  try {
    raw = await withTimeout(
      (signal) => llm.extractCvFields(cvText, signal),
      timeoutMs,
      () => new UpstreamUnavailableError(`CV field extraction timed out after ${timeoutMs}ms.`),
    );
  } catch (error) {
    if (error instanceof UpstreamUnavailableError) {
      throw error;
    }
    throw new UpstreamUnavailableError(`CV field extraction failed: ${describeError(error)}`, undefined, error);
  }

  return normalizeCvFields(raw, nameOverride);
};
