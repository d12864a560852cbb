import { ParseCommandOptions } from '../types';
import { parseIdentifier } from '../analyzers/identifierParser';
import { formatParsedIdentifier } from '../reporters/consoleReporter';

export function runParse(options: ParseCommandOptions): void {
  const { identifiers, format, ...parseOptions } = options;
  if (identifiers.length === 0) {
    throw new Error('No index names given');
  }

  const results = identifiers.map(identifier => ({
    identifier,
    parsed: parseIdentifier(identifier, parseOptions),
  }));

  if (format === 'json') {
    const json = results.map(({ identifier, parsed }) => ({ index_name: identifier, ...parsed }));
    console.log(JSON.stringify(json, null, 2));
    return;
  }

  console.log('');
  for (const { identifier, parsed } of results) {
    console.log(formatParsedIdentifier(identifier, parsed));
    console.log('');
  }
}
