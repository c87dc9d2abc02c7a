import { describe, expect, it } from 'vitest';
import { isEmptyNode, parseFormula } from '../src/math/ommlParser';
import { MathNode } from '../src/types';
import { group, omml, r, run } from './helpers';

const parse = (body: string, maxDepth = 64) => parseFormula(omml(body), { maxDepth, formulaIndex: 3 });

/** The single top-level node of a parsed formula. */
const only = (body: string): MathNode => {
    const { root } = parse(body);
    expect(root.children).toHaveLength(1);
    return root.children[0];
};

describe('parseFormula', () => {
    it('parses runs with their style', () => {
        expect(only(r('x'))).toEqual(run('x'));
        expect(only('<m:r><m:rPr><m:sty m:val="p"/></m:rPr><m:t>d</m:t></m:r>')).toEqual(run('d', { variant: 'upright' }));
        expect(only('<m:r><m:rPr><m:scr m:val="double-struck"/><m:sty m:val="b"/></m:rPr><m:t>R</m:t></m:r>'))
            .toEqual(run('R', { variant: 'bold', script: 'doubleStruck' }));
        expect(only('<m:r><m:rPr><m:nor/></m:rPr><m:t>if</m:t></m:r>')).toEqual(run('if', { normalText: true }));
        expect(only('<m:r><m:rPr><m:aln/></m:rPr><m:t>=</m:t></m:r>')).toEqual(run('=', { alignPoint: true }));
    });

    it('ignores WordprocessingML run properties inside math runs', () => {
        const body = '<m:r><w:rPr xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:b/></w:rPr><m:t>x</m:t></m:r>';
        expect(only(body)).toEqual(run('x'));
    });

    it('keeps siblings in order', () => {
        const { root } = parse(r('a') + r('+') + r('b'));
        expect(root).toEqual(group(run('a'), run('+'), run('b')));
    });

    it('parses fractions and their type', () => {
        expect(only(`<m:f><m:num>${r('1')}</m:num><m:den>${r('2')}</m:den></m:f>`)).toEqual({
            kind: 'fraction', numerator: group(run('1')), denominator: group(run('2')), fractionType: 'bar'
        });
        const linear = only(`<m:f><m:fPr><m:type m:val="lin"/></m:fPr><m:num>${r('a')}</m:num><m:den>${r('b')}</m:den></m:f>`);
        expect(linear).toMatchObject({ kind: 'fraction', fractionType: 'linear' });
    });

    it('parses radicals and hides the degree when asked', () => {
        expect(only(`<m:rad><m:deg>${r('3')}</m:deg><m:e>${r('x')}</m:e></m:rad>`)).toEqual({
            kind: 'radical', radicand: group(run('x')), degree: group(run('3'))
        });
        expect(only(`<m:rad><m:radPr><m:degHide m:val="1"/></m:radPr><m:deg/><m:e>${r('x')}</m:e></m:rad>`)).toEqual({
            kind: 'radical', radicand: group(run('x'))
        });
        expect(only(`<m:rad><m:deg/><m:e>${r('x')}</m:e></m:rad>`)).toEqual({ kind: 'radical', radicand: group(run('x')) });
    });

    it('parses scripts', () => {
        expect(only(`<m:sSup><m:e>${r('x')}</m:e><m:sup>${r('2')}</m:sup></m:sSup>`)).toEqual({
            kind: 'superscript', base: group(run('x')), superscript: group(run('2'))
        });
        expect(only(`<m:sSubSup><m:e>${r('x')}</m:e><m:sub>${r('i')}</m:sub><m:sup>${r('2')}</m:sup></m:sSubSup>`)).toEqual({
            kind: 'subSup', base: group(run('x')), subscript: group(run('i')), superscript: group(run('2'))
        });
        expect(only(`<m:sPre><m:sub>${r('n')}</m:sub><m:sup>${r('k')}</m:sup><m:e>${r('C')}</m:e></m:sPre>`)).toEqual({
            kind: 'preScript', base: group(run('C')), subscript: group(run('n')), superscript: group(run('k'))
        });
    });

    it('parses n-ary operators with defaults', () => {
        const body = `<m:nary><m:sub>${r('0')}</m:sub><m:sup>${r('1')}</m:sup><m:e>${r('f(x)dx')}</m:e></m:nary>`;
        expect(only(body)).toEqual({
            kind: 'nary',
            operator: '∫',
            lower: group(run('0')),
            upper: group(run('1')),
            operand: group(run('f(x)dx')),
            limitPlacement: 'subSup'
        });
    });

    it('reads the n-ary glyph, placement and hidden limits', () => {
        const body = '<m:nary><m:naryPr><m:chr m:val="∑"/><m:limLoc m:val="undOvr"/><m:supHide m:val="on"/></m:naryPr>' +
            `<m:sub>${r('i')}</m:sub><m:sup/><m:e>${r('i')}</m:e></m:nary>`;
        expect(only(body)).toEqual({
            kind: 'nary', operator: '∑', lower: group(run('i')), operand: group(run('i')), limitPlacement: 'undOvr'
        });
    });

    it('parses delimiters with default and explicit markers', () => {
        expect(only(`<m:d><m:e>${r('x')}</m:e></m:d>`)).toEqual({
            kind: 'delimited', elements: [group(run('x'))], open: 'parenthesis', close: 'parenthesis', separator: '|'
        });
        const body = '<m:d><m:dPr><m:begChr m:val=""/><m:endChr m:val="]"/><m:sepChr m:val=","/></m:dPr>' +
            `<m:e>${r('a')}</m:e><m:e>${r('b')}</m:e></m:d>`;
        expect(only(body)).toEqual({
            kind: 'delimited', elements: [group(run('a')), group(run('b'))], open: 'none', close: 'square', separator: ','
        });
    });

    it('reports unknown delimiter glyphs and draws them invisible', () => {
        const { root, diagnostics } = parse(`<m:d><m:dPr><m:begChr m:val="※"/></m:dPr><m:e>${r('x')}</m:e></m:d>`);
        expect(root.children[0]).toMatchObject({ kind: 'delimited', open: 'none', close: 'parenthesis' });
        expect(diagnostics).toEqual([{
            formulaIndex: 3,
            code: 'unrecognized-delimiter',
            reason: 'delimiter glyph "※" has no LaTeX bracket, drawn invisible',
            element: 'd'
        }]);
    });

    it('turns a bracketed matrix into a matrix carrying the markers', () => {
        const matrix = `<m:m><m:mr><m:e>${r('a')}</m:e><m:e>${r('b')}</m:e></m:mr><m:mr><m:e>${r('c')}</m:e><m:e>${r('d')}</m:e></m:mr></m:m>`;
        expect(only(`<m:d><m:dPr><m:begChr m:val="["/><m:endChr m:val="]"/></m:dPr><m:e>${matrix}</m:e></m:d>`)).toEqual({
            kind: 'matrix',
            rows: [[group(run('a')), group(run('b'))], [group(run('c')), group(run('d'))]],
            open: 'square',
            close: 'square'
        });
        expect(only(matrix)).toMatchObject({ kind: 'matrix', open: 'none', close: 'none' });
    });

    it('degrades a ragged matrix', () => {
        const body = `<m:m><m:mr><m:e>${r('a')}</m:e><m:e>${r('b')}</m:e></m:mr><m:mr><m:e>${r('c')}</m:e></m:mr></m:m>`;
        const { root, diagnostics } = parse(body);
        expect(root.children).toEqual([{ kind: 'degraded', text: 'abc', reason: 'm:m rows are not rectangular (2, 1 cells)' }]);
        expect(diagnostics).toEqual([{ formulaIndex: 3, code: 'malformed-shape', reason: 'm:m rows are not rectangular (2, 1 cells)', element: 'm' }]);
    });

    it('parses accents, bars and group characters', () => {
        expect(only(`<m:acc><m:e>${r('x')}</m:e></m:acc>`)).toEqual({ kind: 'accent', base: group(run('x')), accent: 'hat', glyph: '̂' });
        expect(only(`<m:acc><m:accPr><m:chr m:val="⃗"/></m:accPr><m:e>${r('v')}</m:e></m:acc>`)).toMatchObject({ accent: 'vec' });
        expect(only(`<m:acc><m:accPr><m:chr m:val="☃"/></m:accPr><m:e>${r('v')}</m:e></m:acc>`)).toMatchObject({ accent: 'unknown', glyph: '☃' });
        expect(only(`<m:bar><m:e>${r('x')}</m:e></m:bar>`)).toEqual({ kind: 'bar', base: group(run('x')), position: 'top' });
        expect(only(`<m:bar><m:barPr><m:pos m:val="bot"/></m:barPr><m:e>${r('x')}</m:e></m:bar>`)).toMatchObject({ position: 'bottom' });
        expect(only(`<m:groupChr><m:e>${r('x')}</m:e></m:groupChr>`)).toEqual({ kind: 'groupChar', base: group(run('x')), glyph: '⏟', position: 'bottom' });
    });

    it('parses limits and functions', () => {
        const limit = `<m:limLow><m:e>${r('lim')}</m:e><m:lim>${r('n→∞')}</m:lim></m:limLow>`;
        expect(only(`<m:func><m:fName>${limit}</m:fName><m:e>${r('a')}</m:e></m:func>`)).toEqual({
            kind: 'function',
            name: group({ kind: 'limit', base: group(run('lim')), limit: group(run('n→∞')), position: 'lower' }),
            argument: group(run('a'))
        });
        expect(only(`<m:limUpp><m:e>${r('x')}</m:e><m:lim>${r('k')}</m:lim></m:limUpp>`)).toMatchObject({ kind: 'limit', position: 'upper' });
    });

    it('parses equation arrays and wrappers', () => {
        expect(only(`<m:eqArr><m:e>${r('a')}</m:e><m:e>${r('b')}</m:e></m:eqArr>`)).toEqual({
            kind: 'equationArray', rows: [group(run('a')), group(run('b'))]
        });
        expect(only(`<m:box><m:e>${r('x')}</m:e></m:box>`)).toEqual(group(run('x')));
        expect(only(`<m:borderBox><m:e>${r('x')}</m:e></m:borderBox>`)).toEqual({ kind: 'boxed', base: group(run('x')) });
        expect(only(`<m:phant><m:e>${r('x')}</m:e></m:phant>`)).toEqual({ kind: 'phantom', base: group(run('x')) });
    });

    it('degrades a fraction without a denominator and keeps its text', () => {
        const { root, diagnostics } = parse(`<m:f><m:num>${r('1')}</m:num></m:f>`);
        expect(root.children).toEqual([{ kind: 'degraded', text: '1', reason: 'm:f is missing m:den' }]);
        expect(diagnostics).toEqual([{ formulaIndex: 3, code: 'malformed-shape', reason: 'm:f is missing m:den', element: 'f' }]);
    });

    it('degrades unknown elements and continues with their siblings', () => {
        const { root, diagnostics } = parse(`${r('a')}<m:sparkle>${r('b')}</m:sparkle>${r('c')}`);
        expect(root).toEqual(group(run('a'), { kind: 'degraded', text: 'b', reason: 'm:sparkle is not supported, kept as text' }, run('c')));
        expect(diagnostics.map(d => d.code)).toEqual(['unrecognized-node']);
    });

    it('truncates nesting deeper than the cap', () => {
        const nested = `<m:f><m:num><m:f><m:num>${r('1')}</m:num><m:den>${r('2')}</m:den></m:f></m:num><m:den>${r('3')}</m:den></m:f>`;
        const { root, diagnostics } = parse(nested, 1);
        expect(root).toEqual(group({
            kind: 'fraction',
            numerator: group({ kind: 'degraded', text: '12', reason: 'nesting deeper than 1 levels truncated' }),
            denominator: group({ kind: 'degraded', text: '3', reason: 'nesting deeper than 1 levels truncated' }),
            fractionType: 'bar'
        }));
        expect(diagnostics.map(d => [d.code, d.element])).toEqual([['depth-exceeded', 'f'], ['depth-exceeded', 'r']]);
    });

    it('accepts another OMML element as the root', () => {
        const { root } = parseFormula(omml(r('x'), 'sup'), { maxDepth: 64, formulaIndex: 0 });
        expect(root).toEqual(group(group(run('x'))));
    });

    it('reads every formula of an m:oMathPara', () => {
        const { root } = parseFormula(omml(`<m:oMath>${r('a')}</m:oMath><m:oMath>${r('b')}</m:oMath>`, 'oMathPara'), { maxDepth: 64, formulaIndex: 0 });
        expect(root).toEqual(group(group(run('a')), group(run('b'))));
    });
});

describe('isEmptyNode', () => {
    it('treats empty groups and runs as empty', () => {
        expect(isEmptyNode(group())).toBe(true);
        expect(isEmptyNode(group(run('')))).toBe(true);
        expect(isEmptyNode(group(run('x')))).toBe(false);
        expect(isEmptyNode({ kind: 'degraded', text: '', reason: 'r' })).toBe(false);
    });
});
