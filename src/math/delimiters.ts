/**
 * Delimiter Resolver
 *
 * Decides how bracketed content is sized and which matrix environment a
 * bracketed matrix uses.
 *
 * OMML stores the glyph of each side (`<m:begChr m:val="["/>`); an empty value
 * means the side is invisible. An invisible side is still emitted as `\left.` or
 * `\right.` so that the visible side keeps growing with its content.
 *
 * @module delimiters
 */

import { DelimiterMarker } from '../types';

const GLYPH_MARKERS: Readonly<Record<string, DelimiterMarker>> = Object.freeze({
    '': 'none',
    '(': 'parenthesis',
    ')': 'parenthesis',
    '[': 'square',
    ']': 'square',
    '{': 'curly',
    '}': 'curly',
    '|': 'bar',
    '∣': 'bar',
    '‖': 'doubleBar',
    '∥': 'doubleBar',
    '⟨': 'angle',
    '⟩': 'angle',
    '〈': 'angle',
    '〉': 'angle',
    '⌊': 'floor',
    '⌋': 'floor',
    '⌈': 'ceiling',
    '⌉': 'ceiling'
});

/** `[opening, closing]` LaTeX glyph per marker. */
const MARKER_GLYPHS: Readonly<Record<DelimiterMarker, readonly [string, string]>> = Object.freeze({
    none: ['.', '.'],
    parenthesis: ['(', ')'],
    square: ['[', ']'],
    curly: ['\\{', '\\}'],
    bar: ['|', '|'],
    doubleBar: ['\\|', '\\|'],
    angle: ['\\langle', '\\rangle'],
    floor: ['\\lfloor', '\\rfloor'],
    ceiling: ['\\lceil', '\\rceil']
});

const MATRIX_ENVIRONMENTS: Partial<Record<DelimiterMarker, string>> = {
    none: 'matrix',
    parenthesis: 'pmatrix',
    square: 'bmatrix',
    curly: 'Bmatrix',
    bar: 'vmatrix',
    doubleBar: 'Vmatrix'
};

/**
 * Auto-sizing commands for both sides of a delimiter.
 */
export interface ResolvedDelimiters {
    /** @example "\\left(" or "\\left." */
    left: string;
    /** @example "\\right)" or "\\right." */
    right: string;
}

/**
 * Maps an OMML delimiter glyph to its bracket family.
 *
 * @returns The marker, or undefined for a glyph with no LaTeX bracket
 */
export const markerFromGlyph = (glyph: string): DelimiterMarker | undefined => {
    return Object.prototype.hasOwnProperty.call(GLYPH_MARKERS, glyph) ? GLYPH_MARKERS[glyph] : undefined;
};

/**
 * Resolves the auto-sizing commands for a pair of markers.
 *
 * @returns undefined when both sides are invisible, since there is nothing to size
 *
 * @example
 * ```typescript
 * resolveDelimiters('parenthesis', 'parenthesis'); // { left: '\\left(', right: '\\right)' }
 * resolveDelimiters('none', 'square');             // { left: '\\left.', right: '\\right]' }
 * ```
 */
export const resolveDelimiters = (open: DelimiterMarker, close: DelimiterMarker): ResolvedDelimiters | undefined => {
    if (open === 'none' && close === 'none') return undefined;
    return {
        left: `\\left${MARKER_GLYPHS[open][0]}`,
        right: `\\right${MARKER_GLYPHS[close][1]}`
    };
};

/**
 * Chooses the amsmath matrix environment for a matrix enclosed by `open` and `close`.
 *
 * Only matching pairs that amsmath has an environment for resolve; any other
 * pairing (mixed brackets, angle brackets, a single visible side) returns
 * undefined and the caller wraps a plain `matrix` in resolved delimiters instead.
 */
export const matrixEnvironment = (open: DelimiterMarker, close: DelimiterMarker): string | undefined => {
    if (open !== close) return undefined;
    return MATRIX_ENVIRONMENTS[open];
};
