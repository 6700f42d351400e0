export interface RateLimitResult {
  allowed: boolean;
  count: number;     // entries in the window, this request included
  limit: number;
  remaining: number;
  resetAt: number;   // unix timestamp (seconds)
}
