/**
 * Bounded record of non-fatal stream issues: keeps the first `cap` entries
 * and counts every kind.
 */

import type { IssueKind, ProfileIssue } from '../types/motion';

export class IssueLog {
  private readonly entries: ProfileIssue[] = [];
  private readonly counts: Record<IssueKind, number> = {
    'malformed-field': 0,
    'z-decrease': 0,
    'negative-extrusion': 0,
  };

  constructor(private readonly cap: number) {}

  record(issue: ProfileIssue): void {
    this.counts[issue.kind]++;
    if (this.entries.length < this.cap) this.entries.push(issue);
  }

  get issues(): ProfileIssue[] {
    return [...this.entries];
  }

  getCounts(): Record<IssueKind, number> {
    return { ...this.counts };
  }
}
