import { describe, it, expect } from 'vitest';
import { isLegacyDotted, parseLegacyDotted } from '../legacyDottedConvention';
import { parseDataStreamStructured } from '../dataStreamStructuredConvention';
import { parseDataStreamFallback, FallbackOptions } from '../dataStreamFallbackConvention';

const COMPAT: FallbackOptions = { stripMode: 'character-class', fallbackEnvironment: 'application' };

describe('legacy dotted convention', () => {
  it('applies to dotted names without a leading marker', () => {
    expect(isLegacyDotted('metrics.payments.prod')).toBe(true);
    expect(isLegacyDotted('restored.ds-logs')).toBe(true);
    expect(isLegacyDotted('.ds-logs.x')).toBe(false);
    expect(isLegacyDotted('nodots')).toBe(false);
  });

  it('joins every middle segment into the namespace', () => {
    const parsed = parseLegacyDotted('a.b.c.d');
    expect(parsed.dataset).toBe('a');
    expect(parsed.namespace).toBe('b.c');
    expect(parsed.application).toBe('a.b.c');
    expect(parsed.environment).toBe('default');
  });

  it('has no namespace with two segments', () => {
    const parsed = parseLegacyDotted('audit.2024');
    expect(parsed.namespace).toBeNull();
    expect(parsed.application).toBe('audit');
  });

  it('reports an empty middle segment as no namespace', () => {
    const parsed = parseLegacyDotted('a..b');
    expect(parsed.namespace).toBeNull();
    expect(parsed.application).toBe('a');
  });

  it('keeps an empty dataset for hidden system indices', () => {
    const parsed = parseLegacyDotted('.kibana_1');
    expect(parsed.dataset).toBe('');
    expect(parsed.application).toBe('');
  });
});

describe('data stream structured convention', () => {
  it('splits an environment suffix off the namespace', () => {
    expect(parseDataStreamStructured('.ds-logs-system.syslog-production-2024.03.01-000012')).toEqual({
      scheme: 'datastream-structured',
      type: 'logs',
      dataset: 'system',
      namespace: 'syslog',
      environment: 'production',
      application: 'system.syslog',
      date: '2024-03-01',
      iteration: '000012',
    });
  });

  it('splits on the last hyphen of a multi-segment namespace', () => {
    const parsed = parseDataStreamStructured('.ds-logs-k8s.container.logs-team-a-2024.05.06-000007');
    expect(parsed?.namespace).toBe('container.logs-team');
    expect(parsed?.environment).toBe('a');
    expect(parsed?.application).toBe('k8s.container.logs-team');
  });

  it('defaults the environment when there is no namespace', () => {
    const parsed = parseDataStreamStructured('.ds-logs-nginx-2024.01.15-000001');
    expect(parsed?.namespace).toBeNull();
    expect(parsed?.environment).toBe('default');
    expect(parsed?.application).toBe('nginx');
  });

  it('reports an empty namespace left by the environment split as no namespace', () => {
    const parsed = parseDataStreamStructured('.ds-logs-nginx.-prod-2024.01.15-000001');
    expect(parsed?.namespace).toBeNull();
    expect(parsed?.environment).toBe('prod');
    expect(parsed?.application).toBe('nginx');
  });

  it('uses the secondary pattern for a hyphen-separated namespace', () => {
    expect(parseDataStreamStructured('.ds-metrics-generic-default-2024.01.01-000001')).toEqual({
      scheme: 'datastream-structured',
      type: 'metrics',
      dataset: 'generic',
      namespace: 'default',
      environment: null,
      application: 'generic.default',
      date: '2024-01-01',
      iteration: '000001',
    });
  });

  it('ignores text after a complete match', () => {
    const parsed = parseDataStreamStructured('.ds-logs-nginx-2024.01.15-000001-restored');
    expect(parsed?.iteration).toBe('000001');
    expect(parsed?.date).toBe('2024-01-15');
  });

  it('returns null when neither pattern matches', () => {
    expect(parseDataStreamStructured('.ds-logs-nginx.access-prod-2024.1.15-000003')).toBeNull();
    expect(parseDataStreamStructured('logs-nginx-2024.01.15-000001')).toBeNull();
  });
});

describe('data stream textual fallback', () => {
  it('over-strips marker characters in character-class mode', () => {
    expect(parseDataStreamFallback('.ds-sdk-events-2024.1.15-000001', COMPAT)).toEqual({
      scheme: 'datastream-textual-fallback',
      type: 'logs',
      dataset: 'k',
      namespace: 'events',
      environment: 'k.events',
      environmentToken: null,
      application: 'k.events',
      date: null,
      iteration: '000001',
    });
  });

  it('removes only the literal prefix in literal-prefix mode', () => {
    const parsed = parseDataStreamFallback('.ds-sdk-events-2024.1.15-000001', { ...COMPAT, stripMode: 'literal-prefix' });
    expect(parsed.dataset).toBe('sdk');
    expect(parsed.application).toBe('sdk.events');
  });

  it('moves the last hyphen segment of the namespace into the environment token', () => {
    const parsed = parseDataStreamFallback('.ds-logs-app-team-prod-20240115-7', COMPAT);
    expect(parsed.namespace).toBe('app-team');
    expect(parsed.environmentToken).toBe('prod');
    expect(parsed.environment).toBe('logs.app-team');
    expect(parsed.date).toBeNull();
    expect(parsed.iteration).toBe('7');
  });

  it('reports the computed environment with fallbackEnvironment token', () => {
    const parsed = parseDataStreamFallback('.ds-logs-app-team-prod-20240115-7', { ...COMPAT, fallbackEnvironment: 'token' });
    expect(parsed.environment).toBe('prod');
    expect(parsed.environmentToken).toBe('prod');
  });

  it('does not widen an empty namespace from three tokens', () => {
    expect(parseDataStreamFallback('.ds-logs-2024.01.15-000001', COMPAT)).toEqual({
      scheme: 'datastream-textual-fallback',
      type: 'logs',
      dataset: 'logs',
      namespace: null,
      environment: 'logs',
      environmentToken: 'default',
      application: 'logs',
      date: '2024-01-15',
      iteration: '000001',
    });
  });

  it('widens the namespace to the remaining token with two tokens', () => {
    const parsed = parseDataStreamFallback('.ds-foo-bar', COMPAT);
    expect(parsed.dataset).toBe('foo');
    expect(parsed.namespace).toBe('bar');
    expect(parsed.application).toBe('foo.bar');
    expect(parsed.date).toBeNull();
    expect(parsed.iteration).toBeNull();
  });

  it('keeps an empty dataset when nothing follows the marker', () => {
    const parsed = parseDataStreamFallback('.ds-', COMPAT);
    expect(parsed.dataset).toBe('');
    expect(parsed.namespace).toBeNull();
    expect(parsed.environmentToken).toBe('default');
    expect(parsed.application).toBe('');
  });

  it('requires a purely numeric iteration', () => {
    const parsed = parseDataStreamFallback('.ds-logs-web-2024.01.15-0001b', COMPAT);
    expect(parsed.iteration).toBeNull();
    expect(parsed.date).toBe('2024-01-15');
  });
});
