import { EnvironmentClass } from '../types';

// 'nonprod' must be checked before 'prod'
const KEYWORDS: Exclude<EnvironmentClass, 'other'>[] = ['nonprod', 'prod', 'dev', 'default', 'operations'];

/**
 * Keyword tier of a name, case-insensitive. Independent of the naming
 * convention, so it also covers names the parser leaves unrecognized.
 */
export function classifyEnvironment(name: string): EnvironmentClass {
  const lower = name.toLowerCase();
  return KEYWORDS.find(k => lower.includes(k)) ?? 'other';
}
