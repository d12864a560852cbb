import { DataStreamFallbackIdentifier, FallbackEnvironment, StripMode } from '../types';
import {
  buildApplication, isDottedDate, isNumeric, normalizeDate,
  splitOnLastHyphen, stripDataStreamMarker, toNamespace,
} from './identifierPatterns';

export interface FallbackOptions {
  stripMode: StripMode;
  fallbackEnvironment: FallbackEnvironment;
}

/**
 * Splits a marked name on hyphens after stripping the marker:
 * <dataset>-<namespace...>-<date>-<iteration>.
 *
 * Output compatibility: `environment` carries the application string unless
 * `fallbackEnvironment` is 'token'. The computed value is always available
 * as `environmentToken`.
 */
export function parseDataStreamFallback(identifier: string, options: FallbackOptions): DataStreamFallbackIdentifier {
  const parts = stripDataStreamMarker(identifier, options.stripMode).split('-');
  const n = parts.length;
  const dataset = parts[0];

  // '' (not null) when exactly three tokens: the wider slice below is skipped then
  let namespace: string | null = n > 2 ? parts.slice(1, -2).join('-') : null;
  const dateToken = n > 1 && isDottedDate(parts[n - 2]) ? parts[n - 2] : null;
  const iteration = n > 1 && isNumeric(parts[n - 1]) ? parts[n - 1] : null;

  if (namespace === null && n > 1) {
    namespace = parts.slice(1).join('-');
  }

  let environmentToken: string | null = null;
  if (namespace) {
    const split = splitOnLastHyphen(namespace);
    if (split) [namespace, environmentToken] = split;
  }
  if (!namespace) {
    environmentToken = 'default';
  }
  namespace = toNamespace(namespace);

  const application = buildApplication(dataset, namespace);

  return {
    scheme: 'datastream-textual-fallback',
    type: 'logs',
    dataset,
    namespace,
    environment: options.fallbackEnvironment === 'token' ? environmentToken : application,
    environmentToken,
    application,
    date: dateToken ? normalizeDate(dateToken) : null,
    iteration,
  };
}
