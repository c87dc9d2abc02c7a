import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConverterErrorType, getConverterError, getWrappedError, logWarning } from '../src/utils/errorUtils';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('getConverterError', () => {
    it('builds messages with the header', () => {
        expect(getConverterError(ConverterErrorType.INVALID_INPUT, {}).message)
            .toBe('[omml2tex]: Invalid input type: Expected a Buffer, an ArrayBuffer or a valid file path');
        expect(getConverterError(ConverterErrorType.EXTENSION_UNSUPPORTED, {}, '').message)
            .toBe('[omml2tex]: omml2tex reads formulas from docx files only, got an unknown file type.');
    });
});

describe('getWrappedError', () => {
    it('rewrites archive failures as a corrupted file', () => {
        const error = new Error('end of central directory record signature not found');
        expect(getWrappedError(error, {}, 'broken.docx').message).toBe('[omml2tex]: Your file broken.docx seems to be corrupted.');
        expect(getWrappedError(error, {}).message).toBe('[omml2tex]: Your file buffer seems to be corrupted.');
    });

    it('passes errors that already carry the header through', () => {
        const error = getConverterError(ConverterErrorType.IMPROPER_ARGUMENTS, {});
        expect(getWrappedError(error, {})).toBe(error);
    });

    it('wraps anything else', () => {
        expect(getWrappedError('plain failure', {}).message).toBe('[omml2tex]: plain failure');
    });
});

describe('logWarning', () => {
    it('writes only when console output is enabled', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        logWarning('quiet', {});
        logWarning('loud', { outputErrorToConsole: true });
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith('[omml2tex]: loud');
    });
});
