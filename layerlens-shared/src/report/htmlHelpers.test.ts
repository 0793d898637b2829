import { describe, it, expect } from 'vitest';
import { escapeHtml, fmtTick, svgBarChart, svgLineChart } from './htmlHelpers';

describe('escapeHtml', () => {
  it('escapes all special HTML characters', () => {
    expect(escapeHtml('<script>alert("xss")</script>')).toBe(
      '&lt;script&gt;alert(&quot;xss&quot;)&lt;/script&gt;'
    );
  });

  it('escapes ampersands and single quotes', () => {
    expect(escapeHtml('a & b')).toBe('a &amp; b');
    expect(escapeHtml("it's")).toBe('it&#39;s');
  });

  it('handles empty string', () => {
    expect(escapeHtml('')).toBe('');
  });
});

describe('fmtTick', () => {
  it('uses fewer decimals for larger values', () => {
    expect(fmtTick(0)).toBe('0');
    expect(fmtTick(150)).toBe('150');
    expect(fmtTick(12.34)).toBe('12.3');
    expect(fmtTick(1.234)).toBe('1.23');
  });
});

describe('svgLineChart', () => {
  it('breaks the line at missing values', () => {
    const svg = svgLineChart([0, 1, 2], [{ name: 'P95', values: [1, null, 2], color: 'red' }], { title: 'Speed' });
    expect(svg).toContain('d="M56,117 M624,28"');
    expect(svg).toContain('aria-label="Speed"');
  });

  it('draws a dashed limit line', () => {
    const svg = svgLineChart([0, 1], [{ name: 'P95', values: [1, 2], color: 'red' }], { title: 'Flow', limit: 4 });
    expect(svg).toContain('class="chart-limit"');
    expect(svg).toContain('<title>limit 4</title>');
  });

  it('renders an empty state without points', () => {
    expect(svgLineChart([], [], { title: 'Empty' })).toContain('No data');
  });
});

describe('svgBarChart', () => {
  it('draws one bar per entry', () => {
    const svg = svgBarChart([{ label: 'a', value: 1 }, { label: 'b', value: 2 }], { title: 'Bins' });
    expect(svg.match(/<rect /g)).toHaveLength(2);
    expect(svg).toContain('<title>b: 2</title>');
  });

  it('renders an empty state for all-zero bars', () => {
    expect(svgBarChart([{ label: 'a', value: 0 }], { title: 'Bins' })).toContain('No data');
  });
});
