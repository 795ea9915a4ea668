// src/common/config/parse.ts
import YAML from 'yaml';

/**
 * Parse configuration text based on file extension.
 * - JSON when path ends with ".json"
 * - YAML otherwise (an empty document yields an empty object)
 */
export const parseText = (p: string, text: string): unknown => {
  const parsed: unknown = p.endsWith('.json')
    ? JSON.parse(text)
    : YAML.parse(text);
  return parsed ?? {};
};
