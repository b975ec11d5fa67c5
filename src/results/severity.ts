import type { Severity, SeverityCounts, ViolationRecord } from "../types.js";

export const SEVERITY_ORDER: Record<Severity, number> = {
  CRITICAL: 0,
  HIGH: 1,
  MEDIUM: 2,
  LOW: 3,
  UNKNOWN: 4,
  WARNING: 5,
  NONE: 6
};

const UNRANKED = 999;

const SEVERITY_EMOJI: Record<Severity, string> = {
  CRITICAL: "🔴",
  HIGH: "🔴",
  MEDIUM: "🟡",
  LOW: "🟡",
  UNKNOWN: "🟡",
  WARNING: "🟡",
  NONE: "🟢"
};

const UNRANKED_EMOJI = "⚪";

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(SEVERITY_ORDER, value);
}

export function severityRank(severity: unknown): number {
  return isSeverity(severity) ? SEVERITY_ORDER[severity] : UNRANKED;
}

export function severityStatusEmoji(severity: unknown): string {
  return isSeverity(severity) ? SEVERITY_EMOJI[severity] : UNRANKED_EMOJI;
}

/** A violation without a `severity` field counts as UNKNOWN. */
export function violationSeverity(violation: ViolationRecord): unknown {
  return violation.severity === undefined ? "UNKNOWN" : violation.severity;
}

/** Most severe value present, or NONE for an empty list. Unrecognized values never win. */
export function worstSeverity(violations: ViolationRecord[]): string {
  let worst = "NONE";
  let worstRank = severityRank(worst);

  for (const violation of violations) {
    const severity = violationSeverity(violation);
    const rank = severityRank(severity);
    if (rank < worstRank && typeof severity === "string") {
      worst = severity;
      worstRank = rank;
    }
  }

  return worst;
}

export function countBySeverity(violations: ViolationRecord[]): SeverityCounts {
  const counts: SeverityCounts = { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0 };
  for (const violation of violations) {
    const severity = violationSeverity(violation);
    if (severity === "CRITICAL" || severity === "HIGH" || severity === "MEDIUM" || severity === "LOW") {
      counts[severity] += 1;
    }
  }
  return counts;
}

function isPresent(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object" && value !== null) return Object.keys(value).length > 0;
  return Boolean(value);
}

export function countFixable(violations: ViolationRecord[]): number {
  return violations.filter((violation) => isPresent(violation.fixed_version)).length;
}

export function formatScannersUsed(scanners: Record<string, unknown>): string {
  const names = Object.keys(scanners).sort();
  return names.length ? names.join(", ") : "None";
}
