import { describe, it, expect } from 'vitest';
import { IssueLog } from './IssueLog';

describe('IssueLog', () => {
  it('keeps the first entries up to the cap and counts all of them', () => {
    const log = new IssueLog(2);
    log.record({ kind: 'malformed-field', lineNumber: 1, field: 'x', text: '1..2' });
    log.record({ kind: 'z-decrease', lineNumber: 5, value: 0.1, message: 'Z dropped' });
    log.record({ kind: 'malformed-field', lineNumber: 9, field: 'e', text: '' });

    expect(log.issues.map(i => i.lineNumber)).toEqual([1, 5]);
    expect(log.getCounts()).toEqual({ 'malformed-field': 2, 'z-decrease': 1, 'negative-extrusion': 0 });
  });

  it('only counts with a zero cap', () => {
    const log = new IssueLog(0);
    log.record({ kind: 'negative-extrusion', lineNumber: 2, value: -1, message: 'clamped' });
    expect(log.issues).toEqual([]);
    expect(log.getCounts()['negative-extrusion']).toBe(1);
  });
});
