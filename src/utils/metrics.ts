/** How a single request left the rate limiter. */
export type RateLimitOutcome = "allowed" | "blocked" | "failedOpen";

export type RateLimitMetrics = Readonly<Record<RateLimitOutcome, number>>;

const counts: Record<RateLimitOutcome, number> = {
  allowed: 0,
  blocked: 0,
  failedOpen: 0,
};

export function recordOutcome(outcome: RateLimitOutcome) {
  counts[outcome] += 1;
}

export function getMetrics(): RateLimitMetrics {
  return { ...counts };
}

export function resetMetrics() {
  counts.allowed = 0;
  counts.blocked = 0;
  counts.failedOpen = 0;
}
