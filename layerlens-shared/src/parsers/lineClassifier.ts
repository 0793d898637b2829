/**
 * G-code line classifier.
 *
 * Turns one raw line into a typed token. Stateless: the same line always
 * classifies the same way, and nothing here knows about prior lines.
 *
 * @module parsers/lineClassifier
 */

import type {
  Annotation,
  AxisField,
  MalformedField,
  SetpointTarget,
  Token,
} from '../types/gcode';

// ── Constants ──

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;
const MNEMONIC_PATTERN = /^([GMT])\s*(\d+)(?:\.(\d+))?/i;
const LINE_NUMBER_PREFIX = /^N\d+\s*/i;
const CHECKSUM_SUFFIX = /\*\d*\s*$/;
const FIELD_PATTERN = /([A-Za-z])([^A-Za-z\s]*)/g;

const CATEGORY_DIRECTIVE = /^\s*(?:TYPE|FEATURE)\s*:\s*(.*?)\s*$/i;
const LAYER_DIRECTIVE = /^\s*LAYER\s*:\s*(-?\d+)\s*$/i;
const LAYER_CHANGE_DIRECTIVE = /^\s*LAYER_CHANGE\s*$/i;
const LAYER_Z_DIRECTIVE = /^\s*Z\s*:\s*(\S+)\s*$/i;

const FAN_MAX_RAW = 255;

const MOTION_FIELDS: readonly AxisField[] = ['x', 'y', 'z', 'e', 'f'];
const POSITION_FIELDS = ['x', 'y', 'z', 'e'] as const;

interface SetpointSpec {
  target: SetpointTarget;
  /** M109/M190/M191 accept R ("wait for cooling") when S is absent. */
  acceptsR: boolean;
}

const SETPOINT_COMMANDS: Record<string, SetpointSpec> = {
  M104: { target: 'hotend', acceptsR: false },
  M109: { target: 'hotend', acceptsR: true },
  M140: { target: 'bed', acceptsR: false },
  M190: { target: 'bed', acceptsR: true },
  M141: { target: 'chamber', acceptsR: false },
  M191: { target: 'chamber', acceptsR: true },
  M106: { target: 'fan', acceptsR: false },
};

// ── Public API ──

/**
 * Classifies a single G-code line.
 *
 * @param line - Raw line; a trailing CR/LF is tolerated
 * @param lineNumber - 1-based source line, carried onto the token
 */
export function classify(line: string, lineNumber = 0): Token {
  const trimmed = line.replace(/[\r\n]+$/, '').trim();
  if (!trimmed) return { kind: 'blank', lineNumber };

  const semicolon = trimmed.indexOf(';');
  const commentText = semicolon >= 0 ? trimmed.slice(semicolon + 1) : undefined;
  const annotation = commentText !== undefined ? parseDirective(commentText) : undefined;

  const code = stripDecorations(semicolon >= 0 ? trimmed.slice(0, semicolon) : trimmed);

  if (!code) {
    if (annotation) return { kind: 'annotation', lineNumber, annotation };
    if (commentText !== undefined) return { kind: 'comment', lineNumber, text: commentText.trim() };
    return { kind: 'blank', lineNumber };
  }

  const base = annotation ? { lineNumber, annotation } : { lineNumber };

  const mnemonicMatch = code.match(MNEMONIC_PATTERN);
  if (!mnemonicMatch) {
    return { ...base, kind: 'other', mnemonic: code.split(/\s+/)[0].toUpperCase() };
  }

  const mnemonic = normalizeMnemonic(mnemonicMatch);
  const rest = code.slice(mnemonicMatch[0].length);

  switch (mnemonic) {
    case 'G0':
    case 'G1': {
      const { values, errors } = parseFields(rest, MOTION_FIELDS);
      return { ...base, kind: 'motion', command: mnemonic, fields: values, errors };
    }
    case 'G90':
    case 'G91':
      return { ...base, kind: 'positioning', command: mnemonic, scope: 'all', mode: mnemonic === 'G90' ? 'absolute' : 'relative' };
    case 'M82':
    case 'M83':
      return { ...base, kind: 'positioning', command: mnemonic, scope: 'extruder', mode: mnemonic === 'M82' ? 'absolute' : 'relative' };
    case 'G92': {
      const { values, errors } = parseFields(rest, POSITION_FIELDS);
      return { ...base, kind: 'set-position', fields: values, errors };
    }
    case 'M107':
      return { ...base, kind: 'setpoint', command: mnemonic, target: 'fan', value: 0, errors: [] };
    default:
      break;
  }

  const setpoint = SETPOINT_COMMANDS[mnemonic];
  if (setpoint) {
    const { values, errors } = parseFields(rest, ['s', 'r'] as const);
    let value = values.s;
    if (value === undefined && setpoint.acceptsR) value = values.r;
    if (value !== undefined && setpoint.target === 'fan') {
      value = Math.max(0, Math.min(100, (value / FAN_MAX_RAW) * 100));
    }
    return value !== undefined
      ? { ...base, kind: 'setpoint', command: mnemonic, target: setpoint.target, value, errors }
      : { ...base, kind: 'setpoint', command: mnemonic, target: setpoint.target, errors };
  }

  return { ...base, kind: 'other', mnemonic };
}

/**
 * Parses the text after `;` into a directive, or undefined for free text.
 */
export function parseDirective(comment: string): Annotation | undefined {
  const category = comment.match(CATEGORY_DIRECTIVE);
  if (category) {
    return category[1] ? { directive: 'category', label: category[1] } : undefined;
  }

  const layer = comment.match(LAYER_DIRECTIVE);
  if (layer) return { directive: 'layer', index: parseInt(layer[1], 10) };

  if (LAYER_CHANGE_DIRECTIVE.test(comment)) return { directive: 'layer', index: null };

  const layerZ = comment.match(LAYER_Z_DIRECTIVE);
  if (layerZ && NUMBER_PATTERN.test(layerZ[1])) {
    return { directive: 'layer-z', z: Number(layerZ[1]) };
  }

  return undefined;
}

/**
 * Extracts letter-coded numeric fields, first occurrence per letter.
 *
 * A letter whose text is not a number is reported in `errors` and left out
 * of `values`; the remaining fields still parse.
 */
export function parseFields<K extends string>(
  text: string,
  letters: readonly K[],
): { values: Partial<Record<K, number>>; errors: MalformedField[] } {
  const values: Partial<Record<K, number>> = {};
  const errors: MalformedField[] = [];
  const seen = new Set<string>();

  for (const match of text.matchAll(FIELD_PATTERN)) {
    const letter = match[1].toLowerCase();
    if (seen.has(letter)) continue;
    const key = letters.find(l => l === letter);
    if (key === undefined) continue;
    seen.add(letter);

    const raw = match[2];
    if (NUMBER_PATTERN.test(raw)) {
      values[key] = Number(raw);
    } else {
      errors.push({ field: letter, text: raw });
    }
  }

  return { values, errors };
}

// ── Helpers ──

function stripDecorations(code: string): string {
  return code
    .replace(/\([^)]*\)/g, ' ')
    .replace(CHECKSUM_SUFFIX, '')
    .trim()
    .replace(LINE_NUMBER_PREFIX, '')
    .trim();
}

/** `g01` → `G1`, `M104` → `M104`, `G29.1` → `G29.1`. */
function normalizeMnemonic(match: RegExpMatchArray): string {
  const letter = match[1].toUpperCase();
  const number = parseInt(match[2], 10);
  return match[3] !== undefined ? `${letter}${number}.${match[3]}` : `${letter}${number}`;
}
