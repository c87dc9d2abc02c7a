/**
 * Word Document (DOCX) Formula Extractor
 *
 * Finds the OMML formulas of a `.docx` archive and hands them to the conversion
 * pipeline in document order.
 *
 * **Where formulas live:**
 * ```xml
 * <w:body>
 *   <w:p>                          <!-- Paragraph with an inline formula -->
 *     <w:r><w:t>where </w:t></w:r>
 *     <m:oMath>...</m:oMath>
 *   </w:p>
 *   <w:p>                          <!-- Display formula(s) -->
 *     <m:oMathPara>
 *       <m:oMath>...</m:oMath>
 *       <m:oMath>...</m:oMath>
 *     </m:oMathPara>
 *   </w:p>
 * </w:body>
 * ```
 *
 * An `m:oMath` directly in running text is inline. Each `m:oMath` of an
 * `m:oMathPara` is a separate display formula.
 *
 * Parts are read in this order: `word/document.xml`, then `word/footnotes.xml` and
 * `word/endnotes.xml` when notes are included. Formula indices run across parts.
 *
 * @module DocxMathExtractor
 * @see https://www.ecma-international.org/publications-and-standards/standards/ecma-376/ OOXML Standard
 */

import { ConverterConfig, DocumentMetadata, FormulaSource } from '../types';
import { ConverterErrorType, getConverterError } from '../utils/errorUtils';
import { getChildElements, getLocalName, isMathElement, parseDocumentMetadata, parseXmlString, WORD_NS } from '../utils/xmlUtils';
import { extractFiles } from '../utils/zipUtils';

export const DOCUMENT_PART = 'word/document.xml';
export const FOOTNOTES_PART = 'word/footnotes.xml';
export const ENDNOTES_PART = 'word/endnotes.xml';
export const CORE_PROPERTIES_PART = 'docProps/core.xml';

/**
 * Formulas and document properties read from an archive.
 */
export interface ExtractedDocument {
    metadata: DocumentMetadata;
    sources: FormulaSource[];
}

const isParagraph = (element: Element): boolean => {
    if (element.namespaceURI === WORD_NS) return getLocalName(element) === 'p';
    return element.nodeName === 'w:p';
};

const isMath = (element: Element, localName: string): boolean => isMathElement(element) && getLocalName(element) === localName;

/**
 * Finds the formulas of one WordprocessingML part.
 *
 * @param xmlContent - The part's XML
 * @param part - Archive path of the part, recorded in each source's location
 * @param startIndex - Index given to the first formula found
 * @returns The formulas in document order
 *
 * @example
 * ```typescript
 * const sources = findFormulas(documentXml, 'word/document.xml', 0);
 * sources.map(s => s.display); // [false, true, true]
 * ```
 */
export const findFormulas = (xmlContent: string, part: string, startIndex = 0): FormulaSource[] => {
    const root = parseXmlString(xmlContent).documentElement;
    const sources: FormulaSource[] = [];
    if (!root) return sources;

    let paragraphCount = 0;

    const add = (element: Element, display: boolean, paragraphIndex: number) => {
        sources.push({
            index: startIndex + sources.length,
            element,
            display,
            location: { part, paragraphIndex }
        });
    };

    const walk = (element: Element, paragraphIndex: number): void => {
        if (isMath(element, 'oMathPara')) {
            for (const child of getChildElements(element)) {
                if (isMath(child, 'oMath')) add(child, true, paragraphIndex);
            }
            return;
        }
        if (isMath(element, 'oMath')) {
            add(element, false, paragraphIndex);
            return;
        }

        let current = paragraphIndex;
        if (isParagraph(element)) {
            current = paragraphCount++;
        }
        for (const child of getChildElements(element)) {
            walk(child, current);
        }
    };

    walk(root, -1);
    return sources;
};

/**
 * Reads the formulas and the document properties of a `.docx` archive.
 *
 * @param buffer - The archive
 * @param config - `includeNotes` decides whether footnotes and endnotes are scanned
 * @throws {Error} DOCUMENT_PART_MISSING when the archive has no `word/document.xml`
 */
export const extractDocxFormulas = async (buffer: Buffer, config: ConverterConfig): Promise<ExtractedDocument> => {
    const includeNotes = config.includeNotes ?? true;
    const partOrder = includeNotes ? [DOCUMENT_PART, FOOTNOTES_PART, ENDNOTES_PART] : [DOCUMENT_PART];

    const files = await extractFiles(buffer, path => partOrder.includes(path) || path === CORE_PROPERTIES_PART);

    const coreProperties = files.find(file => file.path === CORE_PROPERTIES_PART);
    const metadata = coreProperties ? parseDocumentMetadata(coreProperties.content.toString()) : {};

    if (!files.some(file => file.path === DOCUMENT_PART)) {
        throw getConverterError(ConverterErrorType.DOCUMENT_PART_MISSING, config, DOCUMENT_PART);
    }

    const sources: FormulaSource[] = [];
    for (const part of partOrder) {
        const file = files.find(f => f.path === part);
        if (!file) continue;
        sources.push(...findFormulas(file.content.toString(), part, sources.length));
    }

    return { metadata, sources };
};
