import { createSearchQuerySchema, type SearchQueryInput } from '@propquery/shared';

export const USAGE = 'Usage: npm run search -- "<query>" [--limit N]';

/**
 * Read `<query words...> [--limit N]` from argv. The query and limit are
 * checked against the same rules as the HTTP endpoint.
 */
export function parseSearchArgs(args: readonly string[], maxLimit: number): SearchQueryInput {
  const words: string[] = [];
  let limit: string | undefined;

  for (let i = 0; i < args.length; i++) {
    if (args[i] !== '--limit') {
      words.push(args[i]);
      continue;
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`--limit needs a value\n${USAGE}`);
    }
    limit = value;
    i++;
  }

  const result = createSearchQuerySchema(maxLimit).safeParse({ q: words.join(' '), limit });
  if (!result.success) {
    const reasons = result.error.issues.map((issue) => issue.message).join('; ');
    throw new Error(`${reasons}\n${USAGE}`);
  }
  return result.data;
}
