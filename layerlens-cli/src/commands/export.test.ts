import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { defaultExportBase } from './export';

describe('defaultExportBase', () => {
  it('drops the extension', () => {
    expect(defaultExportBase(path.join('prints', 'part.gcode'))).toBe(path.join('prints', 'part'));
    expect(defaultExportBase('part.gcode')).toBe('part');
  });
});
