import { describe, it, expect } from 'vitest';
import { generateHtmlReport } from './htmlReportGenerator';
import { compareProfiles } from './compare';
import { profileText } from '../profiler/GcodeProfiler';

const PROGRAM = [
  ';TYPE:Skirt',
  'G1 Z0.2 F600',
  'G1 X10 E1',
  ';TYPE:Infill',
  'G1 X10 Y10 E1',
  'G1 Z0.4',
  'G1 X0 Y10 E1',
].join('\n');

const generatedAt = new Date('2026-01-02T03:04:05.000Z');

describe('generateHtmlReport', () => {
  const result = profileText(PROGRAM);

  it('generates valid HTML document', () => {
    const html = generateHtmlReport(result, { generatedAt });
    expect(html).toContain('<!DOCTYPE html>');
    expect(html).toContain('</html>');
    expect(html).toContain('<title>LayerLens Report</title>');
  });

  it('includes the file name in the title and header', () => {
    const html = generateHtmlReport(result, { fileName: 'part.gcode', generatedAt });
    expect(html).toContain('<title>LayerLens Report — part.gcode</title>');
    expect(html).toContain('<div class="file">part.gcode</div>');
  });

  it('escapes the file name', () => {
    const html = generateHtmlReport(result, { fileName: '<b>.gcode', generatedAt });
    expect(html).toContain('&lt;b&gt;.gcode');
    expect(html).not.toContain('<b>.gcode');
  });

  it('shows the timestamp and layer detection', () => {
    const html = generateHtmlReport(result, { generatedAt });
    expect(html).toContain('Profile Report &middot; 2026-01-02T03:04:05.000Z &middot; layers: z-increase');
  });

  it('includes stats cards', () => {
    const html = generateHtmlReport(result, { generatedAt });
    expect(html).toContain('<div class="label">Layers</div>');
    expect(html).toContain('<div class="value">2</div>');
    expect(html).toContain('<div class="sub">5 moves</div>');
  });

  it('renders feature types, slowest layers and legends', () => {
    const html = generateHtmlReport(result, { generatedAt, bins: 4 });
    expect(html).toContain('<div class="section-title">Feature Types</div>');
    expect(html).toContain('<tr><td>Infill</td>');
    expect(html).toContain('<div class="section-title">Slowest Layers</div>');
    expect(html).toContain('<summary>Speed (mm/s)</summary>');
    expect(html).toContain('<summary>Layers (2)</summary>');
  });

  it('leaves out the legend tables when disabled', () => {
    const html = generateHtmlReport(result, { generatedAt, bins: 4, legends: false });
    expect(html).not.toContain('<div class="section-title">Legends</div>');
    expect(html).not.toContain('<summary>Speed (mm/s)</summary>');
    expect(html).toContain('<div class="section-title">Feature Types</div>');
  });

  it('adds a comparison section', () => {
    const comparison = compareProfiles(result, result, { a: 'left', b: 'right' });
    const html = generateHtmlReport(result, { generatedAt, comparison });
    expect(html).toContain('Comparison: left vs right');
    expect(html).toContain('<tr><td>Layers</td><td>2.00</td><td>2.00</td><td class="">0.00</td></tr>');
  });

  it('omits comparison and issues when there are none', () => {
    const html = generateHtmlReport(result, { generatedAt });
    expect(html).not.toContain('Comparison:');
    expect(html).not.toContain('<div class="section-title">Issues</div>');
  });

  it('lists issue counts and samples', () => {
    const html = generateHtmlReport(profileText('G1 X1.2.3 F600\nG1 X5\n'), { generatedAt });
    expect(html).toContain('<div class="section-title">Issues</div>');
    expect(html).toContain('<tr><td>malformed-field</td><td>1</td></tr>');
    expect(html).toContain('<tr><td>1</td><td>malformed-field</td><td>X1.2.3</td></tr>');
  });

  it('handles an empty profile', () => {
    const html = generateHtmlReport(profileText(''), { generatedAt });
    expect(html).toContain('No moves found');
    expect(html).toContain('No data');
  });

  it('sets dark theme by default', () => {
    expect(generateHtmlReport(result, { generatedAt })).toContain('data-theme="dark"');
  });

  it('sets light theme when specified', () => {
    expect(generateHtmlReport(result, { generatedAt, theme: 'light' })).toContain('data-theme="light"');
  });
});
