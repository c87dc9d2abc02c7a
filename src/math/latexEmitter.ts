/**
 * AST-to-LaTeX Emitter
 *
 * Walks the math AST and writes the LaTeX body of the formula (amsmath syntax).
 * Children are emitted first, then wrapped by their parent's command.
 *
 * The emitter is a pure function of the node and the context: the same tree
 * always gives the same string. The only side effect is pushing diagnostics
 * into `context.diagnostics`.
 *
 * @module latexEmitter
 */

import { AccentKind, AccentNode, Diagnostic, MathNode, RunNode, RunStyle } from '../types';
import { escapeMathChar, escapeText, isReserved } from '../utils/latexEscaper';
import { matrixEnvironment, resolveDelimiters } from './delimiters';
import { functionToken, isFunctionName, isIntegral, isInvisible, lookupSymbol, naryToken } from './symbolTable';

/**
 * Formatting mode and diagnostics sink carried through one emission.
 */
export interface EmitContext {
    /** Display (block) formula rather than inline. Affects limit placement only. */
    display: boolean;
    formulaIndex: number;
    diagnostics: Diagnostic[];
    /** Inside an equation array, where alignment marks become `&`. */
    inAlignment?: boolean;
}

const NARROW_ACCENTS: Readonly<Record<Exclude<AccentKind, 'unknown'>, string>> = Object.freeze({
    hat: '\\hat',
    tilde: '\\tilde',
    bar: '\\bar',
    dot: '\\dot',
    ddot: '\\ddot',
    dddot: '\\dddot',
    vec: '\\vec',
    breve: '\\breve',
    check: '\\check',
    ring: '\\mathring',
    grave: '\\grave',
    acute: '\\acute',
    overbrace: '\\overbrace',
    underbrace: '\\underbrace'
});

const WIDE_ACCENTS: Partial<Record<AccentKind, string>> = {
    hat: '\\widehat',
    tilde: '\\widetilde',
    bar: '\\overline',
    vec: '\\overrightarrow'
};

const BRACES = new Set(['⏞', '⏟', '{', '}', '︷', '︸']);

const COMMAND_AT_END = /\\[A-Za-z]+$/;
const SINGLE_TOKEN = /^(?:[^\s{}\\^_]|\\[A-Za-z]+|\\[^A-Za-z\s]|\\[A-Za-z]+\{[^{}]*\})$/u;
const STYLABLE = /^[\p{L}\p{N}]$/u;

/**
 * Concatenates LaTeX fragments, separating a command name that ends in a letter
 * from a following letter (`\alpha` + `x` gives `\alpha x`, not `\alphax`).
 */
export const joinLatex = (parts: string[]): string => {
    let result = '';
    for (const part of parts) {
        if (!part) continue;
        if (COMMAND_AT_END.test(result) && /^[A-Za-z]/.test(part)) {
            result += ' ';
        }
        result += part;
    }
    return result;
};

/**
 * Whether a fragment is one token and can take a script or an accent without braces.
 */
export const isSingleToken = (latex: string): boolean => SINGLE_TOKEN.test(latex);

const braceBase = (latex: string): string => isSingleToken(latex) ? latex : `{${latex}}`;

const styleCommand = (style: RunStyle): string | undefined => {
    switch (style.script) {
        case 'roman': return '\\mathrm';
        case 'script': return '\\mathcal';
        case 'fraktur': return '\\mathfrak';
        case 'doubleStruck': return '\\mathbb';
        case 'sansSerif': return '\\mathsf';
        case 'monospace': return '\\mathtt';
    }
    switch (style.variant) {
        case 'upright': return '\\mathrm';
        case 'bold': return '\\mathbf';
        case 'boldItalic': return '\\boldsymbol';
        default: return undefined;
    }
};

/**
 * Plain text of a node made only of runs, or undefined when it has structure.
 */
const runText = (node: MathNode): string | undefined => {
    if (node.kind === 'run') return node.text;
    if (node.kind === 'degraded') return node.text;
    if (node.kind !== 'group') return undefined;
    let text = '';
    for (const child of node.children) {
        const part = runText(child);
        if (part === undefined) return undefined;
        text += part;
    }
    return text;
};

/**
 * Run text that may be written as an upright function name: italic, bold or
 * script-styled runs keep their style and are not names.
 */
const nameText = (node: MathNode): string | undefined => {
    if (node.kind === 'run' && (node.style.script || (node.style.variant !== 'default' && node.style.variant !== 'upright'))) {
        return undefined;
    }
    if (node.kind === 'group' && node.children.some(child => nameText(child) === undefined)) {
        return undefined;
    }
    return runText(node);
};

const emitRun = (node: RunNode, context: EmitContext): string => {
    const chars = Array.from(node.text).filter(ch => !isInvisible(ch));
    const text = chars.join('');
    const align = node.style.alignPoint && context.inAlignment ? '&' : '';

    if (node.style.normalText) {
        return text ? `${align}\\text{${escapeText(text)}}` : align;
    }

    const trimmed = text.trim();
    if (isFunctionName(trimmed) && !node.style.script && (node.style.variant === 'default' || node.style.variant === 'upright')) {
        return align + functionToken(trimmed);
    }

    const command = styleCommand(node.style);
    const parts: string[] = [];
    let letters = '';

    const flush = () => {
        if (letters) {
            parts.push(`${command}{${letters}}`);
            letters = '';
        }
    };

    for (const ch of chars) {
        if (/\s/u.test(ch)) continue;
        const entry = lookupSymbol(ch);
        // Styled alphabets apply to letters and digits only: "∈R" in double-struck is \in \mathbb{R}
        if (command && !entry && !isReserved(ch) && STYLABLE.test(ch)) {
            letters += ch;
            continue;
        }
        flush();
        parts.push(entry ? entry.token : escapeMathChar(ch));
    }
    flush();

    return align + joinLatex(parts);
};

const emitAccent = (node: AccentNode, context: EmitContext): string => {
    const base = emitLatex(node.base, context);
    const wide = !isSingleToken(base);

    let kind: AccentKind = node.accent;
    if (kind === 'unknown') {
        const codePoint = node.glyph.codePointAt(0) ?? 0;
        context.diagnostics.push({
            formulaIndex: context.formulaIndex,
            code: 'unrecognized-accent',
            reason: `accent U+${codePoint.toString(16).toUpperCase().padStart(4, '0')} has no LaTeX command, drawn as a hat`,
            element: 'acc'
        });
        kind = 'hat';
    }
    const command = (wide ? WIDE_ACCENTS[kind] : undefined) ?? NARROW_ACCENTS[kind];
    return `${command}{${base}}`;
};

/**
 * Emits the LaTeX for a node.
 *
 * @param node - Any node of the math AST
 * @param context - Display mode and the diagnostics sink
 * @returns The LaTeX fragment, without math-mode delimiters
 *
 * @example
 * ```typescript
 * const context = { display: false, formulaIndex: 0, diagnostics: [] };
 * emitLatex({
 *     kind: 'fraction',
 *     numerator: { kind: 'run', text: '1', style: { variant: 'default' } },
 *     denominator: { kind: 'run', text: '2', style: { variant: 'default' } },
 *     fractionType: 'bar'
 * }, context); // "\\frac{1}{2}"
 * ```
 */
export const emitLatex = (node: MathNode, context: EmitContext): string => {
    const emit = (child: MathNode): string => emitLatex(child, context);

    switch (node.kind) {
        case 'run':
            return emitRun(node, context);

        case 'group':
            return joinLatex(node.children.map(emit));

        case 'fraction': {
            const numerator = emit(node.numerator);
            const denominator = emit(node.denominator);
            switch (node.fractionType) {
                case 'linear': return `{${numerator}}/{${denominator}}`;
                case 'skewed': return `{}^{${numerator}}/_{${denominator}}`;
                case 'noBar': return `\\genfrac{}{}{0pt}{}{${numerator}}{${denominator}}`;
                default: return `\\frac{${numerator}}{${denominator}}`;
            }
        }

        case 'radical': {
            const radicand = emit(node.radicand);
            if (node.degree) {
                return `\\sqrt[${emit(node.degree)}]{${radicand}}`;
            }
            return `\\sqrt{${radicand}}`;
        }

        case 'superscript':
            return `${braceBase(emit(node.base))}^{${emit(node.superscript)}}`;

        case 'subscript':
            return `${braceBase(emit(node.base))}_{${emit(node.subscript)}}`;

        case 'subSup':
            return `${braceBase(emit(node.base))}_{${emit(node.subscript)}}^{${emit(node.superscript)}}`;

        case 'preScript':
            return joinLatex([`{}_{${emit(node.subscript)}}^{${emit(node.superscript)}}`, emit(node.base)]);

        case 'nary': {
            const hasLimits = node.lower !== undefined || node.upper !== undefined;
            let placement = '';
            if (hasLimits && node.limitPlacement === 'undOvr' && (!context.display || isIntegral(node.operator))) {
                placement = '\\limits';
            } else if (hasLimits && node.limitPlacement === 'subSup' && context.display && !isIntegral(node.operator)) {
                placement = '\\nolimits';
            }

            const operator = naryToken(node.operator);
            let head = (operator === node.operator ? emitRun({ kind: 'run', text: operator, style: { variant: 'default' } }, context) : operator) + placement;
            if (node.lower) head += `_{${emit(node.lower)}}`;
            if (node.upper) head += `^{${emit(node.upper)}}`;

            const operand = emit(node.operand);
            return operand ? `${head} ${operand}` : head;
        }

        case 'delimited': {
            const separator = node.separator ? emitRun({ kind: 'run', text: node.separator, style: { variant: 'default' } }, context) : '';
            const body = node.elements.map(emit).join(separator);
            const sizing = resolveDelimiters(node.open, node.close);
            if (!sizing) return body;
            return [sizing.left, body, sizing.right].filter(part => part.length > 0).join(' ');
        }

        case 'matrix': {
            const body = node.rows.map(row => row.map(emit).join(' & ')).join(' \\\\ ');
            const environment = matrixEnvironment(node.open, node.close);
            if (environment) {
                return `\\begin{${environment}} ${body} \\end{${environment}}`;
            }
            // Mixed or one-sided brackets: plain matrix inside sized delimiters
            const sizing = resolveDelimiters(node.open, node.close);
            const matrix = `\\begin{matrix} ${body} \\end{matrix}`;
            return sizing ? `${sizing.left} ${matrix} ${sizing.right}` : matrix;
        }

        case 'accent':
            return emitAccent(node, context);

        case 'bar':
            return node.position === 'top' ? `\\overline{${emit(node.base)}}` : `\\underline{${emit(node.base)}}`;

        case 'groupChar': {
            const base = emit(node.base);
            if (BRACES.has(node.glyph)) {
                return node.position === 'top' ? `\\overbrace{${base}}` : `\\underbrace{${base}}`;
            }
            const glyph = emitRun({ kind: 'run', text: node.glyph, style: { variant: 'default' } }, context);
            return node.position === 'top' ? `\\overset{${glyph}}{${base}}` : `\\underset{${glyph}}{${base}}`;
        }

        case 'limit': {
            const base = emit(node.base);
            const limit = emit(node.limit);
            const script = node.position === 'lower' ? `_{${limit}}` : `^{${limit}}`;
            const baseText = nameText(node.base)?.trim();
            const operator = baseText !== undefined && (isFunctionName(baseText) || lookupSymbol(baseText)?.symbolClass === 'operator');
            if (baseText === undefined || !operator) return `\\mathop{${base}}\\limits${script}`;
            // Same placement as an n-ary operator with undOvr limits
            const limits = !context.display || isIntegral(baseText);
            return `${base}${limits ? '\\limits' : ''}${script}`;
        }

        case 'function': {
            const argument = emit(node.argument);
            const name = functionName(node.name, context);
            if (name === undefined) {
                return joinLatex([emit(node.name), argument]);
            }
            return argument ? `${name}\\,${argument}` : name;
        }

        case 'equationArray': {
            const rows = node.rows.map(row => emitLatex(row, { ...context, inAlignment: true }));
            return `\\begin{aligned} ${rows.join(' \\\\ ')} \\end{aligned}`;
        }

        case 'boxed':
            return `\\boxed{${emit(node.base)}}`;

        case 'phantom':
            return `\\phantom{${emit(node.base)}}`;

        case 'degraded':
            return emitRun({ kind: 'run', text: node.text, style: { variant: 'default' } }, context);
    }
};

/**
 * The upright form of a recognised function name, or undefined when the name is
 * not one (then it is emitted like any other run).
 * A name with a limit under it (`lim` over `n→∞`) counts when its base does.
 */
const functionName = (name: MathNode, context: EmitContext): string | undefined => {
    if (runText(name) !== undefined) {
        const text = nameText(name);
        return text !== undefined && isFunctionName(text) ? functionToken(text) : undefined;
    }
    const inner = name.kind === 'group' && name.children.length === 1 ? name.children[0] : name;
    if (inner.kind === 'limit') {
        const baseText = nameText(inner.base);
        if (baseText !== undefined && isFunctionName(baseText)) {
            return emitLatex(inner, context);
        }
    }
    return undefined;
};
