import { LegacyDottedIdentifier } from '../types';
import { DATA_STREAM_PREFIX, buildApplication, isVersion, toNamespace } from './identifierPatterns';

export function isLegacyDotted(identifier: string): boolean {
  return identifier.includes('.') && !identifier.startsWith(DATA_STREAM_PREFIX);
}

/**
 * dataset[.namespace...].suffix
 *
 * The suffix is dropped. A version-shaped suffix moves the second-to-last
 * segment into `environment`; since a dot-split segment never contains a dot
 * that branch cannot fire for real input.
 */
export function parseLegacyDotted(identifier: string): LegacyDottedIdentifier {
  const parts = identifier.split('.');
  const dataset = parts[0];
  const suffix = parts[parts.length - 1];

  let namespace = parts.length > 2 ? toNamespace(parts.slice(1, -1).join('.')) : null;
  let environment = 'default';

  if (isVersion(suffix)) {
    namespace = parts.length > 3 ? toNamespace(parts.slice(1, -2).join('.')) : null;
    if (parts.length > 2) environment = parts[parts.length - 2];
  }

  return {
    scheme: 'legacy-dotted',
    type: 'logs',
    dataset,
    namespace,
    environment,
    application: buildApplication(dataset, namespace),
    date: null,
    iteration: null,
  };
}
