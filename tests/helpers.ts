import concat from 'concat-stream';
import yazl from 'yazl';
import { EmitContext } from '../src/math/latexEmitter';
import { MathNode, RunNode, RunStyle } from '../src/types';
import { MATH_NS, parseXmlString, WORD_NS } from '../src/utils/xmlUtils';

export const mathXml = (body: string, tag = 'oMath'): string =>
    `<m:${tag} xmlns:m="${MATH_NS}">${body}</m:${tag}>`;

/** Parses an OMML body wrapped in `m:oMath` and returns the root element. */
export const omml = (body: string, tag = 'oMath'): Element => parseXmlString(mathXml(body, tag)).documentElement;

/** `<m:r><m:t>text</m:t></m:r>` */
export const r = (text: string): string => `<m:r><m:t>${text}</m:t></m:r>`;

export const run = (text: string, style: Partial<RunStyle> = {}): RunNode => ({
    kind: 'run',
    text,
    style: { variant: 'default', ...style }
});

export const group = (...children: MathNode[]): MathNode => ({ kind: 'group', children });

export const context = (display = false): EmitContext => ({ display, formulaIndex: 0, diagnostics: [] });

export const wordDocument = (body: string): string =>
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
    `<w:document xmlns:w="${WORD_NS}" xmlns:m="${MATH_NS}"><w:body>${body}</w:body></w:document>`;

export const notesPart = (tag: 'footnotes' | 'endnotes', body: string): string =>
    `<w:${tag} xmlns:w="${WORD_NS}" xmlns:m="${MATH_NS}">${body}</w:${tag}>`;

export const coreProperties = (title: string, author: string): string =>
    `<cp:coreProperties xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" ` +
    `xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:dcterms="http://purl.org/dc/terms/">` +
    `<dc:title>${title}</dc:title><dc:creator>${author}</dc:creator>` +
    `<dcterms:created>2024-01-02T03:04:05Z</dcterms:created></cp:coreProperties>`;

/**
 * Builds a zip archive in memory. Parts are stored in the order given.
 */
export const buildArchive = (parts: Array<[string, string]>): Promise<Buffer> => {
    return new Promise((resolve, reject) => {
        const zip = new yazl.ZipFile();
        for (const [path, content] of parts) {
            zip.addBuffer(Buffer.from(content, 'utf8'), path);
        }
        zip.outputStream.on('error', reject);
        zip.outputStream.pipe(concat((data: Buffer) => resolve(data)));
        zip.end();
    });
};
