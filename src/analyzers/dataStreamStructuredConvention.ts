import { DataStreamStructuredIdentifier } from '../types';
import {
  STRUCTURED_PRIMARY, STRUCTURED_SECONDARY,
  buildApplication, normalizeDate, splitOnLastHyphen, toNamespace,
} from './identifierPatterns';

interface StructuredGroups {
  type: string;
  dataset: string;
  namespace: string | null;
  date: string;
  iteration: string;
}

function matchStructured(identifier: string): StructuredGroups | null {
  for (const pattern of [STRUCTURED_PRIMARY, STRUCTURED_SECONDARY]) {
    const groups = pattern.exec(identifier)?.groups;
    if (!groups) continue;
    const { type, dataset, namespace, date, iteration } = groups;
    return { type, dataset, namespace: namespace ?? null, date, iteration };
  }
  return null;
}

/**
 * Parses a backing index name with the primary pattern, then the
 * single-token-namespace one. Returns null when neither matches.
 *
 * A namespace ending in `-<env>` gives up that suffix as the environment;
 * no namespace means "default"; a namespace without a hyphen leaves the
 * environment null.
 */
export function parseDataStreamStructured(identifier: string): DataStreamStructuredIdentifier | null {
  const match = matchStructured(identifier);
  if (!match) return null;

  let namespace = match.namespace;
  let environment: string | null = null;

  if (namespace === null) {
    environment = 'default';
  } else {
    const split = splitOnLastHyphen(namespace);
    if (split) [namespace, environment] = split;
  }
  namespace = toNamespace(namespace);

  return {
    scheme: 'datastream-structured',
    type: match.type,
    dataset: match.dataset,
    namespace,
    environment,
    application: buildApplication(match.dataset, namespace),
    date: normalizeDate(match.date),
    iteration: match.iteration,
  };
}
