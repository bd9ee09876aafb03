import JSON5 from 'json5';

/**
 * Parse a JSON-text tool argument as written by an agent
 * Accepts markdown code fences, trailing commas and JSON5 syntax (single quotes, bare keys)
 */
export function parseJsonArgument(content: string): unknown {
  const trimmed = content.trim();

  // ```json\n...``` or ```\n...```
  const fencedMatch = trimmed.match(/```[^\n]*\n([\s\S]*?)```/i);
  const candidate = fencedMatch && fencedMatch[1] ? fencedMatch[1].trim() : trimmed;

  const tryParse = (value: string): { value: unknown } | null => {
    try {
      return { value: JSON.parse(value) as unknown };
    } catch {
      return null;
    }
  };
  const tryParseJson5 = (value: string): { value: unknown } | null => {
    try {
      return { value: JSON5.parse<unknown>(value) };
    } catch {
      return null;
    }
  };

  const removeTrailingCommas = (value: string): string => value.replace(/,\s*([}\]])/g, '$1');

  const parsed =
    tryParse(candidate) ?? tryParse(removeTrailingCommas(candidate)) ?? tryParseJson5(candidate);
  if (parsed) return parsed.value;

  throw new Error('Failed to parse JSON argument');
}
