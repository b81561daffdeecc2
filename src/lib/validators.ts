function readEnv(name: string): string | undefined {
  return process.env[name];
}

function parseEnvInt(raw: string): number | undefined {
  const parsed = Number.parseInt(raw, 10);
  return Number.isInteger(parsed) ? parsed : undefined;
}

/**
 * Parse a positive integer from an environment variable, returning `fallback`
 * if the variable is absent or invalid. Values below `minimum` also fall back.
 */
export function parsePositiveIntEnv(
  name: string,
  fallback: number,
  minimum = 1
): number {
  const raw = readEnv(name);
  if (raw === undefined) {
    return fallback;
  }

  const parsed = parseEnvInt(raw);
  if (parsed === undefined || parsed < minimum) {
    return fallback;
  }
  return parsed;
}

export function collectPrefixMatches(
  candidates: readonly string[],
  value: string,
  limit: number
): string[] {
  const results: string[] = [];
  for (const candidate of candidates) {
    if (!candidate.startsWith(value)) {
      continue;
    }
    results.push(candidate);
    if (results.length >= limit) {
      break;
    }
  }
  return results;
}
