/**
 * Naming grammar shared by the identifier conventions.
 *
 * Every pattern is anchored at the start only: trailing text after a
 * complete match is ignored.
 */

import { StripMode } from '../types';

export const DATA_STREAM_PREFIX = '.ds-';

// ── Data stream backing index names ─────────────────────────────

/** .ds-<type>-<dataset>[.<namespace>]-<yyyy.mm.dd>-<iteration>, namespace may hold dots and hyphens */
export const STRUCTURED_PRIMARY =
  /^\.ds-(?<type>\w+)-(?<dataset>\w+)(?:\.(?<namespace>[\w.-]+))?-(?<date>\d{4}\.\d{2}\.\d{2})-(?<iteration>\d+)/;

/** .ds-<type>-<dataset>-<namespace>-<yyyy.mm.dd>-<iteration>, single-token namespace */
export const STRUCTURED_SECONDARY =
  /^\.ds-(?<type>\w+)-(?<dataset>\w+)-(?<namespace>\w+)-(?<date>\d{4}\.\d{2}\.\d{2})-(?<iteration>\d+)/;

const MARKER_FOLLOWED_BY_NAME = /\.ds-[\w.-]/;
const DOTTED_DATE = /^\d{4}\.\d{2}\.\d{2}/;
const NUMERIC = /^\d+$/;
const VERSION = /^\d+\.\d+\.\d+/;
const MARKER_CHARS = new Set(['.', 'd', 's', '-']);

// ── Token predicates ────────────────────────────────────────────

export function hasDataStreamMarker(identifier: string): boolean {
  return (
    identifier.startsWith(DATA_STREAM_PREFIX) ||
    identifier.includes(DATA_STREAM_PREFIX) ||
    MARKER_FOLLOWED_BY_NAME.test(identifier)
  );
}

export function isDottedDate(token: string): boolean {
  return DOTTED_DATE.test(token);
}

export function isNumeric(token: string): boolean {
  return NUMERIC.test(token);
}

export function isVersion(token: string): boolean {
  return VERSION.test(token);
}

// ── Normalization ───────────────────────────────────────────────

/** 2024.01.15 → 2024-01-15 */
export function normalizeDate(date: string): string {
  return date.replace(/\./g, '-');
}

/**
 * Removes the data stream marker before textual splitting.
 *
 * 'character-class' drops the whole leading run of '.', 'd', 's' and '-'
 * characters, so ".ds-sdk-x" becomes "k-x". 'literal-prefix' removes ".ds-" once.
 */
export function stripDataStreamMarker(identifier: string, mode: StripMode): string {
  if (mode === 'literal-prefix') {
    return identifier.startsWith(DATA_STREAM_PREFIX)
      ? identifier.slice(DATA_STREAM_PREFIX.length)
      : identifier;
  }
  let start = 0;
  while (start < identifier.length && MARKER_CHARS.has(identifier[start])) start++;
  return identifier.slice(start);
}

/** "a-b-prod" → ["a-b", "prod"]; null when there is no hyphen. */
export function splitOnLastHyphen(value: string): [string, string] | null {
  const idx = value.lastIndexOf('-');
  if (idx < 0) return null;
  return [value.slice(0, idx), value.slice(idx + 1)];
}

/** Empty namespaces count as absent. */
export function toNamespace(value: string | null | undefined): string | null {
  return value ? value : null;
}

export function buildApplication(dataset: string, namespace: string | null): string {
  return namespace ? `${dataset}.${namespace}` : dataset;
}
