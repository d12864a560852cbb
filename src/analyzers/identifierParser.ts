/**
 * Identifier decomposition engine.
 *
 * Classifies an index name under one naming convention and extracts its
 * fields into a frozen ParsedIdentifier. Never throws: anything no
 * convention accepts (including the empty string) is 'unrecognized'.
 *
 * Guard chain, first match wins:
 *   1. legacy dotted      contains '.', no leading '.ds-'
 *   2. structured         primary then secondary backing-index pattern
 *   3. textual fallback   any '.ds-' marker
 *   4. unrecognized
 *
 * With conventionOrder 'fallback-first' steps 2 and 3 swap; every marked
 * name then ends in the textual fallback.
 */

import { ParseOptions, ParsedIdentifier, UnrecognizedIdentifier } from '../types';
import { hasDataStreamMarker } from './identifierPatterns';
import { isLegacyDotted, parseLegacyDotted } from './legacyDottedConvention';
import { parseDataStreamStructured } from './dataStreamStructuredConvention';
import { parseDataStreamFallback } from './dataStreamFallbackConvention';

type Convention = (identifier: string) => ParsedIdentifier | null;

export const UNRECOGNIZED: UnrecognizedIdentifier = Object.freeze({
  scheme: 'unrecognized',
  type: null,
  dataset: null,
  namespace: null,
  environment: null,
  application: null,
  date: null,
  iteration: null,
});

function buildChain(options: ParseOptions): Convention[] {
  const legacy: Convention = id => (isLegacyDotted(id) ? parseLegacyDotted(id) : null);
  const structured: Convention = id => parseDataStreamStructured(id);
  const fallback: Convention = id => {
    if (!hasDataStreamMarker(id)) return null;
    options.log?.(`textual fallback: ${id}`);
    return parseDataStreamFallback(id, {
      stripMode: options.stripMode ?? 'character-class',
      fallbackEnvironment: options.fallbackEnvironment ?? 'application',
    });
  };

  return options.conventionOrder === 'fallback-first'
    ? [legacy, fallback, structured]
    : [legacy, structured, fallback];
}

export function parseIdentifier(identifier: string, options: ParseOptions = {}): ParsedIdentifier {
  for (const convention of buildChain(options)) {
    const parsed = convention(identifier);
    if (parsed) return Object.freeze(parsed);
  }
  return UNRECOGNIZED;
}

/**
 * Parses many identifiers with one option set. Order is kept; entries are
 * independent of each other.
 */
export function parseIdentifiers(identifiers: string[], options: ParseOptions = {}): ParsedIdentifier[] {
  return identifiers.map(id => parseIdentifier(id, options));
}
