import type { IncomingHttpHeaders } from "http";

/**
 * Which browser origins may open a bridge session
 *
 * - `"any"`: accept every origin (development / trusted networks only)
 * - `"same-origin"`: accept origins whose host matches the `Host` header
 * - `string[]`: accept only the listed origins
 *
 * Requests that carry no `Origin` header pass under every policy.
 */
export type OriginPolicy = "any" | "same-origin" | ReadonlyArray<string>;

export const DEFAULT_ORIGIN_POLICY: OriginPolicy = "same-origin";

export function normalizeOrigin(value: string) {
  return value.trim().replace(/\/+$/, "").toLowerCase();
}

function headerValue(value: string | string[] | undefined) {
  if (Array.isArray(value)) return value[0];
  return value;
}

function originHost(origin: string): string | null {
  try {
    return new URL(origin).host.toLowerCase();
  } catch {
    return null;
  }
}

export function isOriginAllowed(policy: OriginPolicy, headers: IncomingHttpHeaders): boolean {
  if (policy === "any") return true;

  // Non-browser clients send no Origin; the check only constrains browsers.
  const origin = headerValue(headers.origin);
  if (origin === undefined) return true;

  if (policy === "same-origin") {
    const host = headerValue(headers.host);
    if (!host) return false;
    return originHost(origin) === host.toLowerCase();
  }

  const wanted = normalizeOrigin(origin);
  return policy.some((allowed) => normalizeOrigin(allowed) === wanted);
}

export function describeOriginPolicy(policy: OriginPolicy) {
  if (policy === "any") return "any origin (development mode)";
  if (policy === "same-origin") return "same origin only";
  return policy.length === 0 ? "no browser origins" : policy.join(", ");
}
