import { describe, it, expect } from 'vitest';
import { GcodeLineReader } from './gcodeLineReader';

function collect() {
  const lines: Array<[string, number]> = [];
  const reader = new GcodeLineReader({ onLine: (line, n) => lines.push([line, n]) });
  return { reader, lines };
}

describe('GcodeLineReader', () => {
  it('joins lines split across chunks and strips CR', () => {
    const { reader, lines } = collect();
    reader.processChunk('G1 X1\r\nG1');
    reader.processChunk(' X2\n');
    reader.processChunk('G1 X3');
    expect(lines).toEqual([['G1 X1', 1], ['G1 X2', 2]]);

    reader.flush();
    expect(lines[2]).toEqual(['G1 X3', 3]);
    expect(reader.linesRead).toBe(3);
  });

  it('numbers blank lines too', () => {
    const { reader, lines } = collect();
    reader.processChunk('a\n\nb\n');
    reader.flush();
    expect(lines).toEqual([['a', 1], ['', 2], ['b', 3]]);
  });
});
