/**
 * Límite de peticiones en formato legible ("100 per hour", "10/minute",
 * "5 per 30 seconds") → cantidad + ventana en ms.
 */
export interface RateLimitWindow {
  limit: number;
  ttlMs: number;
}

const UNIT_MS: Record<string, number> = {
  second: 1_000,
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
};

const RATE_LIMIT_PATTERN = /^(\d+)\s*(?:per|\/)\s*(\d+)?\s*(second|minute|hour|day)s?$/i;

export function parseRateLimit(value: string): RateLimitWindow {
  const match = RATE_LIMIT_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(
      `Límite de peticiones inválido: "${value}" (formato esperado: "100 per hour", "10/minute")`,
    );
  }

  const limit = parseInt(match[1], 10);
  const multiplier = match[2] ? parseInt(match[2], 10) : 1;
  const unit = match[3].toLowerCase();

  if (limit <= 0 || multiplier <= 0) {
    throw new Error(`Límite de peticiones inválido: "${value}" (valores deben ser > 0)`);
  }

  return { limit, ttlMs: multiplier * UNIT_MS[unit] };
}
