/**
 * Classified G-code line tokens.
 *
 * Produced by the line classifier and consumed, in order, by the event
 * builder. Tokens are plain data; nothing here carries state.
 */

/** Letter codes the classifier extracts from motion commands. */
export type AxisField = 'x' | 'y' | 'z' | 'e' | 'f';

/** Numeric field that failed to parse on a single line. */
export interface MalformedField {
  /** Lower-case letter code of the field (e.g. `x`, `s`). */
  field: string;
  /** Raw text that followed the letter. */
  text: string;
}

/** Recognized comment directives. */
export type Annotation =
  | { directive: 'category'; label: string }
  | { directive: 'layer'; index: number | null }
  | { directive: 'layer-z'; z: number };

interface TokenBase {
  /** 1-based line number when the caller supplied one, else 0. */
  lineNumber: number;
  /** Directive found in the line's trailing comment, if any. */
  annotation?: Annotation;
}

export interface MotionToken extends TokenBase {
  kind: 'motion';
  command: 'G0' | 'G1';
  fields: Partial<Record<AxisField, number>>;
  errors: MalformedField[];
}

export type SetpointTarget = 'fan' | 'hotend' | 'bed' | 'chamber';

export interface SetpointToken extends TokenBase {
  kind: 'setpoint';
  command: string;
  target: SetpointTarget;
  /** Fan values are already converted to percent. Absent when the command carried no usable value. */
  value?: number;
  errors: MalformedField[];
}

export interface PositioningToken extends TokenBase {
  kind: 'positioning';
  command: 'G90' | 'G91' | 'M82' | 'M83';
  /** `all` for G90/G91, `extruder` for M82/M83. */
  scope: 'all' | 'extruder';
  mode: 'absolute' | 'relative';
}

export interface SetPositionToken extends TokenBase {
  kind: 'set-position';
  fields: Partial<Record<Exclude<AxisField, 'f'>, number>>;
  errors: MalformedField[];
}

export interface AnnotationToken extends TokenBase {
  kind: 'annotation';
  annotation: Annotation;
}

export interface CommentToken extends TokenBase {
  kind: 'comment';
  text: string;
}

export interface BlankToken extends TokenBase {
  kind: 'blank';
}

export interface OtherToken extends TokenBase {
  kind: 'other';
  mnemonic: string;
}

export type Token =
  | MotionToken
  | SetpointToken
  | PositioningToken
  | SetPositionToken
  | AnnotationToken
  | CommentToken
  | BlankToken
  | OtherToken;

export type TokenKind = Token['kind'];
