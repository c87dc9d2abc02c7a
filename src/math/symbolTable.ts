/**
 * Symbol Table
 *
 * Maps math symbols to LaTeX tokens and classifies them.
 *
 * A symbol is identified either by a single Unicode character / code point
 * (`∑`, `0x2211`) or by a named glyph, which is how function names such as
 * `sin` or `lim` are looked up. The data lives in `symbols.json`; it is read
 * once when this module loads and frozen, so lookups never allocate.
 *
 * Missing entries are not errors: callers emit the raw character, escaped.
 *
 * @module symbolTable
 */

import symbolData from './symbols.json';
import { SymbolClass, SymbolEntry } from '../types';

const SYMBOL_CLASSES: readonly SymbolClass[] = ['ordinary', 'operator', 'relation', 'delimiter', 'functionName'];

const isSymbolClass = (value: string): value is SymbolClass => SYMBOL_CLASSES.some(c => c === value);

const buildSymbols = (): ReadonlyMap<string, SymbolEntry> => {
    const map = new Map<string, SymbolEntry>();
    for (const [char, [token, symbolClass]] of Object.entries(symbolData.symbols)) {
        if (!isSymbolClass(symbolClass)) {
            throw new Error(`Symbol ${char} has unknown class ${symbolClass}`);
        }
        map.set(char, Object.freeze({ token, symbolClass }));
    }
    for (const [name, token] of Object.entries(symbolData.functions)) {
        map.set(name, Object.freeze({ token, symbolClass: 'functionName' }));
    }
    return map;
};

const SYMBOLS = buildSymbols();
const FUNCTION_NAMES: ReadonlySet<string> = new Set(Object.keys(symbolData.functions));
const INTEGRALS: ReadonlySet<string> = new Set(symbolData.integrals);
const INVISIBLE: ReadonlySet<string> = new Set(symbolData.invisible);

/**
 * Looks up a symbol.
 *
 * @param identity - A character, a code point, or a function name
 * @returns The token and class, or undefined when the table has no entry
 *
 * @example
 * ```typescript
 * lookupSymbol('α');     // { token: '\\alpha', symbolClass: 'ordinary' }
 * lookupSymbol(0x2264);  // { token: '\\leq', symbolClass: 'relation' }
 * lookupSymbol('sin');   // { token: '\\sin', symbolClass: 'functionName' }
 * lookupSymbol('x');     // undefined
 * ```
 */
export const lookupSymbol = (identity: string | number): SymbolEntry | undefined => {
    const key = typeof identity === 'number' ? String.fromCodePoint(identity) : identity;
    return SYMBOLS.get(key);
};

/**
 * Whether `name` is a recognised function name. Case sensitive, so `Pr` matches and `PR` does not.
 */
export const isFunctionName = (name: string): boolean => FUNCTION_NAMES.has(name.trim());

/**
 * The upright LaTeX form of a function name: a built-in command where LaTeX has one,
 * `\operatorname{...}` otherwise.
 */
export const functionToken = (name: string): string => {
    const trimmed = name.trim();
    const entry = SYMBOLS.get(trimmed);
    if (entry && entry.symbolClass === 'functionName') return entry.token;
    return `\\operatorname{${trimmed}}`;
};

/**
 * The command for an n-ary operator glyph. Glyphs the table does not know are
 * returned as they are.
 */
export const naryToken = (glyph: string): string => {
    const entry = SYMBOLS.get(glyph);
    return entry && entry.symbolClass === 'operator' ? entry.token : glyph;
};

/**
 * Whether an n-ary glyph is an integral sign. Integrals place their limits beside
 * the sign even in display style.
 */
export const isIntegral = (glyph: string): boolean => INTEGRALS.has(glyph);

/**
 * Zero-width characters Word leaves in runs. They are dropped.
 */
export const isInvisible = (char: string): boolean => INVISIBLE.has(char);
