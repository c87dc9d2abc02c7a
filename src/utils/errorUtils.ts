/**
 * Error Handling Utilities
 *
 * Centralised error and warning reporting for omml2tex.
 * Fatal problems (bad input to the document entry points) become thrown errors built here;
 * problems inside a single formula never throw and are reported through `logWarning`
 * next to the diagnostics returned to the caller.
 */

import { ConverterConfig } from '../types';

/** Error header prefix for all error messages */
const ERRORHEADER = "[omml2tex]: ";

/**
 * Standard error types for omml2tex.
 */
export enum ConverterErrorType {
    /** The file is not a Word document */
    EXTENSION_UNSUPPORTED = 'EXTENSION_UNSUPPORTED',
    /** The archive appears to be corrupted or malformed */
    FILE_CORRUPTED = 'FILE_CORRUPTED',
    /** File could not be found at the specified path */
    FILE_DOES_NOT_EXIST = 'FILE_DOES_NOT_EXIST',
    /** Specified location is a directory or not reachable */
    LOCATION_NOT_FOUND = 'LOCATION_NOT_FOUND',
    /** Arguments passed to the function are missing or invalid */
    IMPROPER_ARGUMENTS = 'IMPROPER_ARGUMENTS',
    /** The buffer could not be identified */
    IMPROPER_BUFFERS = 'IMPROPER_BUFFERS',
    /** Input type is not a supported type (string, Buffer, ArrayBuffer) */
    INVALID_INPUT = 'INVALID_INPUT',
    /** The archive has no main document part */
    DOCUMENT_PART_MISSING = 'DOCUMENT_PART_MISSING'
}

type MessageBuilder = string | ((info: string) => string);

const ERROR_MESSAGES: Record<ConverterErrorType, MessageBuilder> = {
    [ConverterErrorType.EXTENSION_UNSUPPORTED]: (ext: string) => `omml2tex reads formulas from docx files only, got ${ext || 'an unknown file type'}.`,
    [ConverterErrorType.FILE_CORRUPTED]: (filepath: string) => `Your file ${filepath} seems to be corrupted.`,
    [ConverterErrorType.FILE_DOES_NOT_EXIST]: (filepath: string) => `File ${filepath} could not be found! Check if the file exists or verify the relative path from your terminal's location.`,
    [ConverterErrorType.LOCATION_NOT_FOUND]: (location: string) => `Entered location ${location} is not a file.`,
    [ConverterErrorType.IMPROPER_ARGUMENTS]: `Improper arguments`,
    [ConverterErrorType.IMPROPER_BUFFERS]: `Error occured while reading the file buffers`,
    [ConverterErrorType.INVALID_INPUT]: `Invalid input type: Expected a Buffer, an ArrayBuffer or a valid file path`,
    [ConverterErrorType.DOCUMENT_PART_MISSING]: (part: string) => `The archive has no ${part} part.`
};

const createConverterError = (type: ConverterErrorType, info?: string): string => {
    const msg = ERROR_MESSAGES[type];
    return typeof msg === 'function' ? msg(info ?? '') : msg;
};

/**
 * Creates, optionally logs to console, and returns a formatted error.
 *
 * @param type - The type of error
 * @param config - Converter configuration (checks outputErrorToConsole)
 * @param info - Optional additional information such as a file path
 * @returns The Error object to be thrown
 */
export const getConverterError = (type: ConverterErrorType, config: ConverterConfig, info?: string): Error => {
    const message = createConverterError(type, info);
    if (config.outputErrorToConsole) {
        console.error(ERRORHEADER + message);
    }
    return new Error(ERRORHEADER + message);
};

/**
 * Wraps an existing error with the omml2tex header.
 * Messages the archive reader produces for broken zip files are rewritten to FILE_CORRUPTED.
 * Errors that already carry the header are passed through unchanged.
 *
 * @param error - The caught value
 * @param config - Converter configuration
 * @param filePath - Optional file path for context
 */
export const getWrappedError = (error: unknown, config: ConverterConfig, filePath?: string): Error => {
    let message = error instanceof Error ? error.message : String(error);
    if (message.startsWith(ERRORHEADER) && error instanceof Error) {
        return error;
    }

    if (
        message.includes('end of central directory record') ||
        message.includes('invalid XML') ||
        message.includes('Failed to open zip file') ||
        message.includes('invalid distance too far back')
    ) {
        message = createConverterError(ConverterErrorType.FILE_CORRUPTED, filePath ?? 'buffer');
    }

    if (config.outputErrorToConsole) {
        console.error(ERRORHEADER + message);
    }
    return new Error(ERRORHEADER + message);
};

/**
 * Conditionally logs a warning message to the console.
 * Used for degraded formulas, which never stop the conversion.
 */
export const logWarning = (message: string, config: ConverterConfig, error?: unknown): void => {
    if (config.outputErrorToConsole) {
        if (error !== undefined) {
            console.warn(ERRORHEADER + message, error);
        } else {
            console.warn(ERRORHEADER + message);
        }
    }
};
