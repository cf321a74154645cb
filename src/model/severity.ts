export const SEVERITIES = ["low", "medium", "high", "critical"] as const;

export type Severity = (typeof SEVERITIES)[number];

export type SeverityCounts = Record<Severity, number>;

const SEVERITY_RANK: Record<Severity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

/** Sort comparator placing the most severe first. */
export function compareSeverityDesc(left: Severity, right: Severity): number {
  return SEVERITY_RANK[right] - SEVERITY_RANK[left];
}

export function emptySeverityCounts(): SeverityCounts {
  return { low: 0, medium: 0, high: 0, critical: 0 };
}

export function countBySeverity(items: ReadonlyArray<{ severity: Severity }>): SeverityCounts {
  const counts = emptySeverityCounts();
  for (const item of items) {
    counts[item.severity] += 1;
  }
  return counts;
}
