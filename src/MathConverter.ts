/**
 * omml2tex - Main Entry Point
 *
 * This module provides the `MathConverter` class with the two entry points of the package:
 * converting every formula of a Word document, and converting a standalone OMML snippet.
 *
 * **Usage:**
 * ```typescript
 * import { MathConverter } from 'omml2tex';
 *
 * // Convert from file path
 * const result = await MathConverter.convertDocx('paper.docx', {
 *   displayWrapper: 'equation'
 * });
 *
 * // Convert from Buffer
 * const buffer = fs.readFileSync('paper.docx');
 * const result = await MathConverter.convertDocx(buffer);
 *
 * // All formulas as LaTeX
 * console.log(result.toLatex());
 *
 * // A single formula
 * const formula = MathConverter.convertOmml('<m:oMath xmlns:m="...">...</m:oMath>');
 * ```
 *
 * @module MathConverter
 */

import * as fileType from 'file-type';
import * as fs from 'fs';
import { convertFormula, convertFormulas, wrapFormula } from './math/pipeline';
import { extractDocxFormulas } from './parsers/DocxMathExtractor';
import { ConverterConfig, DocumentMathResult, FormulaResult } from './types';
import { ConverterErrorType, getConverterError, getWrappedError, logWarning } from './utils/errorUtils';
import { parseXmlString } from './utils/xmlUtils';

/** Archive types `file-type` may report for a Word document. */
const DOCX_TYPES = new Set(['docx', 'zip']);

const withDefaults = (config: ConverterConfig = {}): Required<ConverterConfig> => ({
    outputErrorToConsole: false,
    maxDepth: 64,
    newlineDelimiter: '\n',
    includeNotes: true,
    displayWrapper: 'brackets',
    ...config
});

/**
 * Main converter class.
 */
export class MathConverter {
    /**
     * Converts every formula of a Word document to LaTeX.
     *
     * This method:
     * 1. Accepts a file path, Buffer, or ArrayBuffer
     * 2. Checks the file type (from the extension, or the content for buffers)
     * 3. Reads the formulas of the document body, footnotes and endnotes
     * 4. Converts each formula independently
     *
     * Only bad input throws. A formula that cannot be converted cleanly is kept
     * as its text and reported in `diagnostics`.
     *
     * @param file - File path (string), Buffer, or ArrayBuffer containing the document
     * @param config - Optional configuration object (defaults applied for all omitted options)
     * @returns The converted formulas, the document properties and `toLatex()`
     * @throws {Error} If the file doesn't exist, isn't a docx file, or the archive is corrupted
     *
     * @example
     * ```typescript
     * const result = await MathConverter.convertDocx('paper.docx');
     * for (const formula of result.formulas) {
     *   console.log(formula.display ? 'display' : 'inline', formula.latex);
     * }
     * ```
     */
    public static async convertDocx(file: string | Buffer | ArrayBuffer, config?: ConverterConfig): Promise<DocumentMathResult> {
        const internalConfig = withDefaults(config);

        let buffer: Buffer = Buffer.alloc(0);
        let ext = '';
        let filePath: string | undefined;

        try {
            if (!file) {
                throw getConverterError(ConverterErrorType.IMPROPER_ARGUMENTS, internalConfig);
            }

            if (file instanceof ArrayBuffer) {
                buffer = Buffer.from(file);
            } else if (Buffer.isBuffer(file)) {
                buffer = file;
            } else if (typeof file === 'string') {
                filePath = file;
                if (!fs.existsSync(file)) {
                    throw getConverterError(ConverterErrorType.FILE_DOES_NOT_EXIST, internalConfig, file);
                }
                if (fs.lstatSync(file).isDirectory()) {
                    throw getConverterError(ConverterErrorType.LOCATION_NOT_FOUND, internalConfig, file);
                }
                ext = file.split('.').pop()?.toLowerCase() || '';
                if (ext !== 'docx') {
                    throw getConverterError(ConverterErrorType.EXTENSION_UNSUPPORTED, internalConfig, ext);
                }
                buffer = fs.readFileSync(file);
            } else {
                throw getConverterError(ConverterErrorType.INVALID_INPUT, internalConfig);
            }

            if (!ext) {
                const type = await fileType.fromBuffer(buffer);
                if (!type) {
                    throw getConverterError(ConverterErrorType.IMPROPER_BUFFERS, internalConfig);
                }
                if (!DOCX_TYPES.has(type.ext)) {
                    throw getConverterError(ConverterErrorType.EXTENSION_UNSUPPORTED, internalConfig, type.ext);
                }
            }

            const { metadata, sources } = await extractDocxFormulas(buffer, internalConfig);
            const formulas = convertFormulas(sources, internalConfig);

            return {
                metadata,
                formulas,
                diagnostics: formulas.flatMap(formula => formula.diagnostics),
                toLatex: () => formulas.map(formula => wrapFormula(formula, internalConfig)).join(internalConfig.newlineDelimiter)
            };
        } catch (error) {
            throw getWrappedError(error, internalConfig, filePath);
        }
    }

    /**
     * Converts a standalone OMML snippet (an `m:oMath` or `m:oMathPara` document).
     *
     * Never throws: XML that cannot be read yields `{}` and an `internal-error` diagnostic.
     *
     * @param xml - The snippet, with the math namespace declared
     * @param display - Whether the formula is a display formula
     * @param config - Optional configuration object
     *
     * @example
     * ```typescript
     * const result = MathConverter.convertOmml(
     *   '<m:oMath xmlns:m="http://schemas.openxmlformats.org/officeDocument/2006/math">' +
     *   '<m:r><m:t>x</m:t></m:r></m:oMath>'
     * );
     * result.latex; // "x"
     * ```
     */
    public static convertOmml(xml: string, display = false, config?: ConverterConfig): FormulaResult {
        const internalConfig = withDefaults(config);

        let root: Element | null = null;
        let failure = 'the snippet has no root element';
        try {
            root = parseXmlString(xml).documentElement;
        } catch (error) {
            failure = error instanceof Error ? error.message : String(error);
        }

        if (!root) {
            logWarning(`snippet could not be read: ${failure}`, internalConfig);
            return {
                index: 0,
                display,
                latex: '{}',
                degraded: true,
                diagnostics: [{ formulaIndex: 0, code: 'internal-error', reason: failure }]
            };
        }

        return convertFormula({ index: 0, element: root, display }, internalConfig);
    }
}
