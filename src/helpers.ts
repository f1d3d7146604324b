import { ConversionError, PipelineError } from "./errors.js";

/**
 * Safely extract a message string from an unknown error value.
 */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  return String(e);
}

/**
 * Message plus source location, when the error knows where it came from.
 */
export function formatError(e: unknown): string {
  const message = errorMessage(e);
  if (e instanceof ConversionError || e instanceof PipelineError) {
    const loc = e.location;
    if (loc) return `${message} (${loc})`;
  }
  return message;
}

// --- Parameter suggestions ---

function levenshtein(a: string, b: string): number {
  const m = a.length, n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));
  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;
  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }
  return dp[m][n];
}

/** Closest valid parameter name within edit distance 3, or null. */
export function closestMatch(input: string, candidates: string[], maxDistance = 3): string | null {
  let best: string | null = null;
  let bestDist = maxDistance + 1;
  for (const candidate of candidates) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist) {
      bestDist = dist;
      best = candidate;
    }
  }
  return best;
}

/**
 * Error text for parameters a tool does not take, or null when all are known.
 */
export function unknownParameterError(toolName: string, args: Record<string, unknown>, validKeys: string[]): string | null {
  const unknownKeys = Object.keys(args).filter((k) => !validKeys.includes(k));
  if (unknownKeys.length === 0) return null;
  const hints = unknownKeys
    .map((k) => {
      const suggestion = closestMatch(k, validKeys);
      return suggestion ? `Unknown parameter '${k}': Did you mean '${suggestion}'?` : `Unknown parameter '${k}'.`;
    })
    .join("\n");
  return `${hints}\n\nValid parameters for ${toolName}: ${validKeys.join(", ")}`;
}
