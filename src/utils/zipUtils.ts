/**
 * ZIP Archive Extraction Utilities
 *
 * A `.docx` file is a ZIP archive of XML parts. Formulas live in
 * `word/document.xml` (and in the footnote and endnote parts), document
 * properties in `docProps/core.xml`.
 *
 * @module zipUtils
 */

import yauzl from 'yauzl';
import concat from 'concat-stream';

/**
 * A part read from the archive.
 */
export interface ArchivePart {
    /** Path of the part inside the archive. @example "word/document.xml" */
    path: string;
    content: Buffer;
}

/**
 * Reads the archive parts whose path passes `filterFn`.
 *
 * Entries are read lazily, one at a time, so entries that are filtered out
 * (media, fonts) are never inflated.
 *
 * @param zipInput - The archive as a Buffer
 * @param filterFn - Receives each entry's path; return true to read it
 * @returns The matching parts, in archive order
 * @throws {Error} If the archive cannot be opened or an entry cannot be read
 *
 * @example
 * ```typescript
 * const [document] = await extractFiles(docx, path => path === 'word/document.xml');
 * ```
 */
export const extractFiles = (zipInput: Buffer, filterFn: (fileName: string) => boolean): Promise<ArchivePart[]> => {
    return new Promise((resolve, reject) => {
        yauzl.fromBuffer(zipInput, { lazyEntries: true }, (err, zipfile) => {
            if (err) return reject(err);
            if (!zipfile) return reject(new Error("Failed to open zip file"));

            const parts: ArchivePart[] = [];

            zipfile.on('entry', (entry: yauzl.Entry) => {
                // directories end with a slash and carry no content
                if (entry.fileName.endsWith('/') || !filterFn(entry.fileName)) {
                    zipfile.readEntry();
                    return;
                }

                zipfile.openReadStream(entry, (streamErr, readStream) => {
                    if (streamErr) return reject(streamErr);
                    if (!readStream) return reject(new Error("Failed to open read stream"));

                    readStream.on('error', reject);
                    readStream.pipe(concat((data: Buffer) => {
                        parts.push({ path: entry.fileName, content: data });
                        zipfile.readEntry();
                    }));
                });
            });

            zipfile.on('end', () => resolve(parts));
            zipfile.on('error', reject);

            zipfile.readEntry();
        });
    });
};
