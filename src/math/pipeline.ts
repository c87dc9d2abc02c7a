/**
 * Conversion Pipeline
 *
 * Drives parse → emit for each formula and isolates failures: a formula that
 * cannot be converted cleanly still yields a result (its salvaged text) and a
 * diagnostic, and never stops the formulas after it.
 *
 * @module pipeline
 */

import { ConverterConfig, Diagnostic, FormulaResult, FormulaSource } from '../types';
import { logWarning } from '../utils/errorUtils';
import { escapeMathChar } from '../utils/latexEscaper';
import { getMathText } from '../utils/xmlUtils';
import { emitLatex, joinLatex } from './latexEmitter';
import { parseFormula } from './ommlParser';
import { isInvisible } from './symbolTable';

const DEFAULT_MAX_DEPTH = 64;

/** Body used when a formula has no content left. */
const EMPTY_FORMULA = '{}';

const normalizeWhitespace = (latex: string): string => latex.replace(/\s+/g, ' ').trim();

/** Salvaged text of a formula, escaped so it is still valid math-mode input. */
const fallbackLatex = (element: Element): string => joinLatex(Array.from(getMathText(element))
    .filter(ch => !isInvisible(ch) && !/\s/u.test(ch))
    .map(escapeMathChar));

/**
 * Converts one formula to its LaTeX body.
 *
 * Never throws. Any error raised while converting is recorded as an
 * `internal-error` diagnostic and the formula falls back to its text.
 *
 * @param source - The formula element, its index and display flag
 * @param config - Only `maxDepth` and `outputErrorToConsole` are read
 * @returns The LaTeX body (without math-mode delimiters) and the diagnostics of this formula
 *
 * @example
 * ```typescript
 * const result = convertFormula({ index: 0, element, display: false }, {});
 * result.latex;    // "\\frac{1}{2}"
 * result.degraded; // false
 * ```
 */
export const convertFormula = (source: FormulaSource, config: ConverterConfig = {}): FormulaResult => {
    const diagnostics: Diagnostic[] = [];
    let latex: string;

    try {
        const parsed = parseFormula(source.element, {
            maxDepth: config.maxDepth ?? DEFAULT_MAX_DEPTH,
            formulaIndex: source.index
        });
        diagnostics.push(...parsed.diagnostics);
        latex = emitLatex(parsed.root, { display: source.display, formulaIndex: source.index, diagnostics });
    } catch (error) {
        diagnostics.push({
            formulaIndex: source.index,
            code: 'internal-error',
            reason: error instanceof Error ? error.message : String(error)
        });
        latex = fallbackLatex(source.element);
    }

    for (const diagnostic of diagnostics) {
        logWarning(`formula ${diagnostic.formulaIndex}: ${diagnostic.reason}`, config);
    }

    const result: FormulaResult = {
        index: source.index,
        display: source.display,
        latex: normalizeWhitespace(latex) || EMPTY_FORMULA,
        degraded: diagnostics.length > 0,
        diagnostics
    };
    if (source.location) result.location = source.location;
    return result;
};

/**
 * Converts a sequence of formulas, one result per source, in the order given.
 *
 * Formulas are independent: a failure in one is contained in its own result.
 */
export const convertFormulas = (sources: FormulaSource[], config: ConverterConfig = {}): FormulaResult[] => {
    return sources.map(source => convertFormula(source, config));
};

/**
 * Wraps a converted body in math-mode delimiters.
 *
 * - inline: `$…$`
 * - display, `displayWrapper: 'brackets'` (default): `\[` and `\]` on their own lines
 * - display, `displayWrapper: 'equation'`: an unnumbered `equation*` environment
 */
export const wrapFormula = (result: Pick<FormulaResult, 'latex' | 'display'>, config: ConverterConfig = {}): string => {
    if (!result.display) {
        return `$${result.latex}$`;
    }
    if (config.displayWrapper === 'equation') {
        return `\\begin{equation*}\n${result.latex}\n\\end{equation*}`;
    }
    return `\\[\n${result.latex}\n\\]`;
};
