/**
 * Escaping of literal text placed into LaTeX.
 *
 * Math mode and text mode reserve the same characters but need different
 * replacements: `\backslash` only exists in math mode, `\textbackslash` only in text mode.
 *
 * @module latexEscaper
 */

const MATH_ESCAPES: Readonly<Record<string, string>> = Object.freeze({
    '#': '\\#',
    '$': '\\$',
    '%': '\\%',
    '&': '\\&',
    '_': '\\_',
    '{': '\\{',
    '}': '\\}',
    '\\': '\\backslash',
    '~': '\\sim',
    '^': '\\hat{}'
});

const TEXT_ESCAPES: Readonly<Record<string, string>> = Object.freeze({
    '#': '\\#',
    '$': '\\$',
    '%': '\\%',
    '&': '\\&',
    '_': '\\_',
    '{': '\\{',
    '}': '\\}',
    '\\': '\\textbackslash{}',
    '~': '\\textasciitilde{}',
    '^': '\\textasciicircum{}'
});

const RESERVED = /[#$%&_{}\\~^]/g;

/**
 * Whether a single character is reserved by LaTeX.
 */
export const isReserved = (char: string): boolean => char.length === 1 && '#$%&_{}\\~^'.includes(char);

/**
 * Escapes one character for math mode. Characters that are not reserved come back unchanged.
 *
 * @example
 * escapeMathChar('%') // "\\%"
 * escapeMathChar('é') // "é"
 */
export const escapeMathChar = (char: string): string => MATH_ESCAPES[char] ?? char;

/**
 * Escapes a string for use inside `\text{...}`.
 */
export const escapeText = (text: string): string => text.replace(RESERVED, ch => TEXT_ESCAPES[ch] ?? ch);
