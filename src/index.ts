#!/usr/bin/env node
/**
 * omml2tex - Office Math to LaTeX
 *
 * Converts the equations of Word documents (Office Math Markup Language, OMML)
 * into LaTeX math markup.
 *
 * **Quick Start:**
 * ```typescript
 * import { MathConverter } from 'omml2tex';
 *
 * const result = await MathConverter.convertDocx('paper.docx');
 *
 * console.log(result.toLatex());    // Every formula, wrapped in $...$ or \[...\]
 * console.log(result.formulas);     // One result per formula, in document order
 * console.log(result.diagnostics);  // What could not be converted cleanly
 * ```
 *
 * **Command line:**
 * ```
 * omml2tex paper.docx [--verbose]
 * ```
 *
 * **Main Exports:**
 * - `MathConverter` - Entry class
 * - `convertFormula`, `convertFormulas`, `wrapFormula` - Formula pipeline
 * - `parseFormula`, `emitLatex` - Parser and emitter, for working on the AST directly
 * - All type definitions
 *
 * @packageDocumentation
 * @module omml2tex
 */

import { MathConverter } from './MathConverter';
import { emitLatex, EmitContext } from './math/latexEmitter';
import { parseFormula, ParsedFormula, ParseOptions } from './math/ommlParser';
import { convertFormula, convertFormulas, wrapFormula } from './math/pipeline';
import { lookupSymbol } from './math/symbolTable';
import { extractDocxFormulas, findFormulas } from './parsers/DocxMathExtractor';
import { ConverterErrorType } from './utils/errorUtils';

const convertDocx = MathConverter.convertDocx;
const convertOmml = MathConverter.convertOmml;

export {
    MathConverter,
    convertDocx,
    convertOmml,
    convertFormula,
    convertFormulas,
    wrapFormula,
    parseFormula,
    emitLatex,
    lookupSymbol,
    findFormulas,
    extractDocxFormulas,
    ConverterErrorType
};
export type { EmitContext, ParsedFormula, ParseOptions };
export type * from './types';

export default MathConverter;

type Writer = (text: string) => void;

const USAGE = 'Usage: omml2tex <file.docx> [--verbose]';

/**
 * Runs the command line tool.
 *
 * Prints every formula of the document (`toLatex()`) to `out`, and the diagnostics
 * to `err` when `--verbose` is given.
 *
 * @param args - Arguments after the program name
 * @returns The exit code
 */
export const runCli = async (args: string[], out: Writer, err: Writer): Promise<number> => {
    const verbose = args.includes('--verbose');
    const files = args.filter(arg => !arg.startsWith('--'));

    if (files.length !== 1) {
        err(USAGE);
        return 1;
    }

    try {
        const result = await MathConverter.convertDocx(files[0]);
        out(result.toLatex());
        if (verbose) {
            for (const diagnostic of result.diagnostics) {
                err(`formula ${diagnostic.formulaIndex}: [${diagnostic.code}] ${diagnostic.reason}`);
            }
        }
        return 0;
    } catch (error) {
        err(error instanceof Error ? error.message : String(error));
        return 1;
    }
};

if (require.main === module) {
    runCli(process.argv.slice(2), text => console.log(text), text => console.error(text))
        .then(code => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            console.error(error);
            process.exitCode = 1;
        });
}
