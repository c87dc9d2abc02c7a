/**
 * Formula Tree Parser
 *
 * Turns one OMML formula (`m:oMath` / `m:oMathPara` DOM element) into the math AST.
 *
 * **OMML Structure:**
 * ```xml
 * <m:oMath>
 *   <m:f>                          <!-- Fraction -->
 *     <m:fPr><m:type m:val="lin"/></m:fPr>
 *     <m:num><m:r><m:t>1</m:t></m:r></m:num>
 *     <m:den><m:r><m:t>2</m:t></m:r></m:den>
 *   </m:f>
 * </m:oMath>
 * ```
 *
 * Every structure element has property children (`m:fPr`, `m:naryPr`, ...) and
 * argument children (`m:num`, `m:e`, `m:sub`, ...). Arguments are parsed first,
 * then the node is built from them.
 *
 * **Degradation:**
 * A structure that lacks a required argument, an element this parser does not
 * know, and anything nested deeper than `maxDepth` become a `degraded` node
 * holding the subtree's literal text. Each such case adds one diagnostic and
 * the rest of the formula is parsed normally.
 *
 * @module ommlParser
 * @see https://www.ecma-international.org/publications-and-standards/standards/ecma-376/ ECMA-376 Part 1, §22.1 Math
 */

import { AccentKind, DelimiterMarker, Diagnostic, DiagnosticCode, GroupNode, MathNode, NaryNode, RunScript, RunStyle, RunVariant } from '../types';
import { getChildElements, getLocalName, getMathChild, getMathChildren, getMathFlag, getMathProperty, getMathText, isMathElement } from '../utils/xmlUtils';
import { markerFromGlyph } from './delimiters';

export interface ParseOptions {
    /** Nesting depth past which subtrees are truncated to text. */
    maxDepth: number;
    /** Index of the formula, copied into diagnostics. */
    formulaIndex: number;
}

export interface ParsedFormula {
    root: GroupNode;
    diagnostics: Diagnostic[];
}

/** Accent glyphs (combining marks and their spacing look-alikes). */
const ACCENT_KINDS: Readonly<Record<string, AccentKind>> = Object.freeze({
    '̂': 'hat',
    '^': 'hat',
    'ˆ': 'hat',
    '̃': 'tilde',
    '~': 'tilde',
    '˜': 'tilde',
    '̄': 'bar',
    '̅': 'bar',
    '¯': 'bar',
    '̇': 'dot',
    '˙': 'dot',
    '̈': 'ddot',
    '¨': 'ddot',
    '⃛': 'dddot',
    '⃗': 'vec',
    '→': 'vec',
    '̆': 'breve',
    '˘': 'breve',
    '̌': 'check',
    'ˇ': 'check',
    '̊': 'ring',
    '˚': 'ring',
    '̀': 'grave',
    '`': 'grave',
    '́': 'acute',
    '´': 'acute',
    '⏞': 'overbrace',
    '⏟': 'underbrace'
});

const STYLE_VARIANTS: Readonly<Record<string, RunVariant>> = Object.freeze({
    p: 'upright',
    b: 'bold',
    i: 'italic',
    bi: 'boldItalic'
});

const SCRIPTS: Readonly<Record<string, RunScript>> = Object.freeze({
    'roman': 'roman',
    'script': 'script',
    'fraktur': 'fraktur',
    'double-struck': 'doubleStruck',
    'sans-serif': 'sansSerif',
    'monospace': 'monospace'
});

/** Argument containers. Met outside their parent they are parsed as plain groups. */
const ARGUMENT_TAGS = new Set(['e', 'num', 'den', 'sub', 'sup', 'deg', 'lim', 'fName', 'oMath', 'oMathPara']);

/** ECMA-376 defaults for absent properties. */
const DEFAULT_NARY_CHAR = '∫';
const DEFAULT_ACCENT_CHAR = '̂';
const DEFAULT_GROUP_CHAR = '⏟';
const DEFAULT_SEPARATOR = '|';

const lookup = <T>(table: Readonly<Record<string, T>>, key: string | undefined): T | undefined => {
    if (key === undefined || !Object.prototype.hasOwnProperty.call(table, key)) return undefined;
    return table[key];
};

/**
 * Whether a node carries nothing to emit. Empty limits and degrees are treated as absent.
 */
export const isEmptyNode = (node: MathNode): boolean => {
    if (node.kind === 'group') return node.children.every(isEmptyNode);
    if (node.kind === 'run') return node.text.length === 0;
    return false;
};

/**
 * Parses one formula.
 *
 * @param element - An `m:oMath` or `m:oMathPara` element. Any other OMML element is
 *                  accepted too and becomes the single child of the root group.
 * @param options - Depth cap and formula index
 * @returns The root group and the diagnostics collected on the way
 *
 * @example
 * ```typescript
 * const doc = parseXmlString(ommlXml);
 * const { root, diagnostics } = parseFormula(doc.documentElement, { maxDepth: 64, formulaIndex: 0 });
 * ```
 */
export const parseFormula = (element: Element, options: ParseOptions): ParsedFormula => {
    const diagnostics: Diagnostic[] = [];

    const degrade = (el: Element, code: DiagnosticCode, reason: string): MathNode => {
        diagnostics.push({ formulaIndex: options.formulaIndex, code, reason, element: getLocalName(el) });
        return { kind: 'degraded', text: getMathText(el), reason };
    };

    const missing = (el: Element, ...required: string[]): MathNode => {
        const absent = required.filter(name => !getMathChild(el, name));
        return degrade(el, 'malformed-shape', `m:${getLocalName(el)} is missing ${absent.map(name => `m:${name}`).join(', ')}`);
    };

    // Property elements (m:fPr, m:rPr, m:ctrlPr...) and foreign markup are not content
    const isContent = (el: Element): boolean => isMathElement(el) && !getLocalName(el).endsWith('Pr');

    const parseChildren = (container: Element, depth: number): MathNode[] => {
        const nodes: MathNode[] = [];
        for (const child of getChildElements(container)) {
            if (isContent(child)) {
                nodes.push(parseElement(child, depth + 1));
            }
        }
        return nodes;
    };

    const parseArgument = (container: Element, depth: number): GroupNode => ({
        kind: 'group',
        children: parseChildren(container, depth)
    });

    /**
     * Looks up required argument containers. Returns undefined if any is absent,
     * so the caller can degrade before parsing anything.
     */
    const requireArguments = (el: Element, names: string[]): Element[] | undefined => {
        const found: Element[] = [];
        for (const name of names) {
            const arg = getMathChild(el, name);
            if (!arg) return undefined;
            found.push(arg);
        }
        return found;
    };

    const optionalArgument = (el: Element, name: string, depth: number, hidden = false): MathNode | undefined => {
        if (hidden) return undefined;
        const arg = getMathChild(el, name);
        if (!arg) return undefined;
        const node = parseArgument(arg, depth);
        return isEmptyNode(node) ? undefined : node;
    };

    const parseRun = (el: Element): MathNode => {
        const rPr = getMathChild(el, 'rPr');
        const style: RunStyle = {
            variant: lookup(STYLE_VARIANTS, getMathProperty(rPr, 'sty')) ?? 'default'
        };
        const script = lookup(SCRIPTS, getMathProperty(rPr, 'scr'));
        if (script) style.script = script;
        if (getMathFlag(rPr, 'nor')) style.normalText = true;
        if (getMathFlag(rPr, 'aln')) style.alignPoint = true;

        return { kind: 'run', text: getMathText(el), style };
    };

    const parseFraction = (el: Element, depth: number): MathNode => {
        const args = requireArguments(el, ['num', 'den']);
        if (!args) return missing(el, 'num', 'den');

        const type = getMathProperty(getMathChild(el, 'fPr'), 'type');
        return {
            kind: 'fraction',
            numerator: parseArgument(args[0], depth),
            denominator: parseArgument(args[1], depth),
            fractionType: type === 'lin' ? 'linear' : type === 'skw' ? 'skewed' : type === 'noBar' ? 'noBar' : 'bar'
        };
    };

    const parseRadical = (el: Element, depth: number): MathNode => {
        const args = requireArguments(el, ['e']);
        if (!args) return missing(el, 'e');

        const degHide = getMathFlag(getMathChild(el, 'radPr'), 'degHide');
        const degree = optionalArgument(el, 'deg', depth, degHide);
        const radicand = parseArgument(args[0], depth);
        return degree ? { kind: 'radical', radicand, degree } : { kind: 'radical', radicand };
    };

    const parseScript = (el: Element, depth: number): MathNode => {
        const tag = getLocalName(el);
        if (tag === 'sSup') {
            const args = requireArguments(el, ['e', 'sup']);
            if (!args) return missing(el, 'e', 'sup');
            return { kind: 'superscript', base: parseArgument(args[0], depth), superscript: parseArgument(args[1], depth) };
        }
        if (tag === 'sSub') {
            const args = requireArguments(el, ['e', 'sub']);
            if (!args) return missing(el, 'e', 'sub');
            return { kind: 'subscript', base: parseArgument(args[0], depth), subscript: parseArgument(args[1], depth) };
        }

        const args = requireArguments(el, ['e', 'sub', 'sup']);
        if (!args) return missing(el, 'e', 'sub', 'sup');
        const [base, subscript, superscript] = args.map(arg => parseArgument(arg, depth));
        if (tag === 'sPre') return { kind: 'preScript', base, subscript, superscript };
        return { kind: 'subSup', base, subscript, superscript };
    };

    const parseNary = (el: Element, depth: number): MathNode => {
        const args = requireArguments(el, ['e']);
        if (!args) return missing(el, 'e');

        const naryPr = getMathChild(el, 'naryPr');
        const node: NaryNode = {
            kind: 'nary',
            operator: getMathProperty(naryPr, 'chr') || DEFAULT_NARY_CHAR,
            operand: parseArgument(args[0], depth),
            limitPlacement: getMathProperty(naryPr, 'limLoc') === 'undOvr' ? 'undOvr' : 'subSup'
        };
        const lower = optionalArgument(el, 'sub', depth, getMathFlag(naryPr, 'subHide'));
        const upper = optionalArgument(el, 'sup', depth, getMathFlag(naryPr, 'supHide'));
        if (lower) node.lower = lower;
        if (upper) node.upper = upper;
        return node;
    };

    const delimiterMarker = (el: Element, glyph: string): DelimiterMarker => {
        const marker = markerFromGlyph(glyph);
        if (marker) return marker;
        diagnostics.push({
            formulaIndex: options.formulaIndex,
            code: 'unrecognized-delimiter',
            reason: `delimiter glyph "${glyph}" has no LaTeX bracket, drawn invisible`,
            element: getLocalName(el)
        });
        return 'none';
    };

    const parseMatrix = (el: Element, depth: number, open: DelimiterMarker = 'none', close: DelimiterMarker = 'none'): MathNode => {
        const rows = getMathChildren(el, 'mr').map(row => getMathChildren(row, 'e'));
        if (rows.length === 0) return missing(el, 'mr');

        const width = rows[0].length;
        if (width === 0 || rows.some(row => row.length !== width)) {
            return degrade(el, 'malformed-shape', `m:m rows are not rectangular (${rows.map(row => row.length).join(', ')} cells)`);
        }

        return {
            kind: 'matrix',
            rows: rows.map(row => row.map(cell => parseArgument(cell, depth + 1))),
            open,
            close
        };
    };

    const parseDelimiter = (el: Element, depth: number): MathNode => {
        const elements = getMathChildren(el, 'e');
        if (elements.length === 0) return missing(el, 'e');

        const dPr = getMathChild(el, 'dPr');
        const open = delimiterMarker(el, getMathProperty(dPr, 'begChr') ?? '(');
        const close = delimiterMarker(el, getMathProperty(dPr, 'endChr') ?? ')');

        // (matrix) is a bracketed matrix, not a matrix inside brackets
        if (elements.length === 1) {
            const content = getChildElements(elements[0]).filter(isContent);
            if (content.length === 1 && getLocalName(content[0]) === 'm') {
                return depth + 1 > options.maxDepth
                    ? degrade(content[0], 'depth-exceeded', `nesting deeper than ${options.maxDepth} levels truncated`)
                    : parseMatrix(content[0], depth + 1, open, close);
            }
        }

        return {
            kind: 'delimited',
            elements: elements.map(arg => parseArgument(arg, depth)),
            open,
            close,
            separator: getMathProperty(dPr, 'sepChr') ?? DEFAULT_SEPARATOR
        };
    };

    const parseAccent = (el: Element, depth: number): MathNode => {
        const args = requireArguments(el, ['e']);
        if (!args) return missing(el, 'e');

        const glyph = getMathProperty(getMathChild(el, 'accPr'), 'chr') || DEFAULT_ACCENT_CHAR;
        return { kind: 'accent', base: parseArgument(args[0], depth), accent: lookup(ACCENT_KINDS, glyph) ?? 'unknown', glyph };
    };

    const parseBar = (el: Element, depth: number): MathNode => {
        const args = requireArguments(el, ['e']);
        if (!args) return missing(el, 'e');

        const pos = getMathProperty(getMathChild(el, 'barPr'), 'pos');
        return { kind: 'bar', base: parseArgument(args[0], depth), position: pos === 'bot' ? 'bottom' : 'top' };
    };

    const parseGroupChar = (el: Element, depth: number): MathNode => {
        const args = requireArguments(el, ['e']);
        if (!args) return missing(el, 'e');

        const props = getMathChild(el, 'groupChrPr');
        return {
            kind: 'groupChar',
            base: parseArgument(args[0], depth),
            glyph: getMathProperty(props, 'chr') || DEFAULT_GROUP_CHAR,
            position: getMathProperty(props, 'pos') === 'top' ? 'top' : 'bottom'
        };
    };

    const parseLimit = (el: Element, depth: number): MathNode => {
        const args = requireArguments(el, ['e', 'lim']);
        if (!args) return missing(el, 'e', 'lim');

        return {
            kind: 'limit',
            base: parseArgument(args[0], depth),
            limit: parseArgument(args[1], depth),
            position: getLocalName(el) === 'limUpp' ? 'upper' : 'lower'
        };
    };

    const parseFunction = (el: Element, depth: number): MathNode => {
        const args = requireArguments(el, ['fName', 'e']);
        if (!args) return missing(el, 'fName', 'e');
        return { kind: 'function', name: parseArgument(args[0], depth), argument: parseArgument(args[1], depth) };
    };

    const parseEquationArray = (el: Element, depth: number): MathNode => {
        const rows = getMathChildren(el, 'e');
        if (rows.length === 0) return missing(el, 'e');
        return { kind: 'equationArray', rows: rows.map(row => parseArgument(row, depth)) };
    };

    const parseWrapper = (el: Element, depth: number, kind: 'boxed' | 'phantom' | 'group'): MathNode => {
        const args = requireArguments(el, ['e']);
        if (!args) return missing(el, 'e');
        const base = parseArgument(args[0], depth);
        return kind === 'group' ? base : { kind, base };
    };

    function parseElement(el: Element, depth: number): MathNode {
        if (depth > options.maxDepth) {
            return degrade(el, 'depth-exceeded', `nesting deeper than ${options.maxDepth} levels truncated`);
        }

        const tag = getLocalName(el);
        switch (tag) {
            case 'r':
                return parseRun(el);
            case 't':
                return { kind: 'run', text: el.textContent ?? '', style: { variant: 'default' } };
            case 'f':
                return parseFraction(el, depth);
            case 'rad':
                return parseRadical(el, depth);
            case 'sSup':
            case 'sSub':
            case 'sSubSup':
            case 'sPre':
                return parseScript(el, depth);
            case 'nary':
                return parseNary(el, depth);
            case 'd':
                return parseDelimiter(el, depth);
            case 'm':
                return parseMatrix(el, depth);
            case 'acc':
                return parseAccent(el, depth);
            case 'bar':
                return parseBar(el, depth);
            case 'groupChr':
                return parseGroupChar(el, depth);
            case 'limLow':
            case 'limUpp':
                return parseLimit(el, depth);
            case 'func':
                return parseFunction(el, depth);
            case 'eqArr':
                return parseEquationArray(el, depth);
            case 'box':
                return parseWrapper(el, depth, 'group');
            case 'borderBox':
                return parseWrapper(el, depth, 'boxed');
            case 'phant':
                return parseWrapper(el, depth, 'phantom');
            default:
                if (ARGUMENT_TAGS.has(tag)) return parseArgument(el, depth);
                return degrade(el, 'unrecognized-node', `m:${tag} is not supported, kept as text`);
        }
    }

    const tag = getLocalName(element);
    const root: GroupNode = tag === 'oMath' || tag === 'oMathPara'
        ? parseArgument(element, 0)
        : { kind: 'group', children: [parseElement(element, 1)] };

    return { root, diagnostics };
};

