/**
 * Configuration options for the MathConverter.
 */
export interface ConverterConfig {
    /**
     * Flag to show all the logs to console in case of an error or a degraded formula,
     * irrespective of your own handling.
     * Default is false.
     */
    outputErrorToConsole?: boolean;
    /**
     * Maximum nesting depth the formula parser descends into.
     * Anything nested deeper is truncated to its plain text and reported.
     * Default is 64.
     */
    maxDepth?: number;
    /**
     * The delimiter placed between formulas when a whole document is rendered with `toLatex()`.
     * Default is \n.
     */
    newlineDelimiter?: string;
    /**
     * Flag to also collect formulas from footnotes and endnotes of a Word document.
     * Default is true.
     */
    includeNotes?: boolean;
    /**
     * How display formulas are wrapped by `wrapFormula` and `toLatex()`.
     * - `brackets`: `\[ ... \]`
     * - `equation`: `\begin{equation*} ... \end{equation*}`
     *
     * Default is 'brackets'.
     */
    displayWrapper?: 'brackets' | 'equation';
}

/**
 * Classification of a symbol, used for spacing and styling decisions.
 */
export type SymbolClass = 'ordinary' | 'operator' | 'relation' | 'delimiter' | 'functionName';

/**
 * A resolved entry of the symbol table.
 */
export interface SymbolEntry {
    /** The LaTeX token the symbol is written as. @example "\\alpha" */
    token: string;
    /** The class of the symbol. */
    symbolClass: SymbolClass;
}

/**
 * Typeface intent declared on a math run.
 * Corresponds to `<m:sty m:val="..."/>` in OMML (`p`, `b`, `i`, `bi`).
 * `default` means nothing was declared: single letters are italic, function names upright.
 */
export type RunVariant = 'default' | 'upright' | 'bold' | 'italic' | 'boldItalic';

/**
 * Alphabet declared on a math run.
 * Corresponds to `<m:scr m:val="..."/>` in OMML.
 */
export type RunScript = 'roman' | 'script' | 'fraktur' | 'doubleStruck' | 'sansSerif' | 'monospace';

/**
 * Styling carried by a run, read from its `m:rPr` properties.
 */
export interface RunStyle {
    variant: RunVariant;
    script?: RunScript;
    /**
     * The run is ordinary text rather than math (`<m:nor/>`).
     * Emitted in text mode.
     */
    normalText?: boolean;
    /**
     * The run starts at an alignment point (`<m:aln/>`).
     * Only honoured inside equation arrays.
     */
    alignPoint?: boolean;
}

/**
 * Bracket family of one side of a delimiter.
 * `none` is an invisible delimiter that still takes part in sizing.
 */
export type DelimiterMarker = 'none' | 'parenthesis' | 'square' | 'curly' | 'bar' | 'doubleBar' | 'angle' | 'floor' | 'ceiling';

/**
 * Kinds of accents the emitter knows a command for.
 * `unknown` keeps the original glyph on the node and falls back to a generic accent.
 */
export type AccentKind =
    | 'hat'
    | 'tilde'
    | 'bar'
    | 'dot'
    | 'ddot'
    | 'dddot'
    | 'vec'
    | 'breve'
    | 'check'
    | 'ring'
    | 'grave'
    | 'acute'
    | 'overbrace'
    | 'underbrace'
    | 'unknown';

/** Literal text or symbol. Leaf of the tree. */
export interface RunNode {
    kind: 'run';
    text: string;
    style: RunStyle;
}

/** Ordered sequence without a semantic wrapper. Every formula root is a group. */
export interface GroupNode {
    kind: 'group';
    children: MathNode[];
}

/**
 * Fraction.
 * `bar` is the stacked form, `linear` the inline slash form, `skewed` a diagonal slash
 * and `noBar` a stacked form without rule.
 */
export interface FractionNode {
    kind: 'fraction';
    numerator: MathNode;
    denominator: MathNode;
    fractionType: 'bar' | 'linear' | 'skewed' | 'noBar';
}

/** Root. An absent degree is a square root. */
export interface RadicalNode {
    kind: 'radical';
    radicand: MathNode;
    degree?: MathNode;
}

export interface SuperscriptNode {
    kind: 'superscript';
    base: MathNode;
    superscript: MathNode;
}

export interface SubscriptNode {
    kind: 'subscript';
    base: MathNode;
    subscript: MathNode;
}

/** Both scripts on one base. Never split into a subscript and a superscript node. */
export interface SubSupNode {
    kind: 'subSup';
    base: MathNode;
    subscript: MathNode;
    superscript: MathNode;
}

/** Scripts placed before the base (`m:sPre`). */
export interface PreScriptNode {
    kind: 'preScript';
    base: MathNode;
    subscript: MathNode;
    superscript: MathNode;
}

/**
 * Big operator (sum, integral, product, union...) with optional limits.
 * `limitPlacement` is the source's request: `subSup` beside the operator, `undOvr` below and above.
 */
export interface NaryNode {
    kind: 'nary';
    operator: string;
    lower?: MathNode;
    upper?: MathNode;
    operand: MathNode;
    limitPlacement: 'subSup' | 'undOvr';
}

/** Bracketed elements, joined by `separator` when there are several. */
export interface DelimitedNode {
    kind: 'delimited';
    elements: MathNode[];
    open: DelimiterMarker;
    close: DelimiterMarker;
    separator: string;
}

/** Rectangular matrix. Markers come from an enclosing delimiter, `none` otherwise. */
export interface MatrixNode {
    kind: 'matrix';
    rows: MathNode[][];
    open: DelimiterMarker;
    close: DelimiterMarker;
}

export interface AccentNode {
    kind: 'accent';
    base: MathNode;
    accent: AccentKind;
    /** The glyph the source used, kept for diagnostics on unknown accents. */
    glyph: string;
}

/** Overline or underline (`m:bar`). */
export interface BarNode {
    kind: 'bar';
    base: MathNode;
    position: 'top' | 'bottom';
}

/** Stretchy character above or below the base, usually a brace (`m:groupChr`). */
export interface GroupCharNode {
    kind: 'groupChar';
    base: MathNode;
    glyph: string;
    position: 'top' | 'bottom';
}

/** lim/max/min style construct (`m:limLow`, `m:limUpp`). */
export interface LimitNode {
    kind: 'limit';
    base: MathNode;
    limit: MathNode;
    position: 'lower' | 'upper';
}

/** Function application (`m:func`). */
export interface FunctionNode {
    kind: 'function';
    name: MathNode;
    argument: MathNode;
}

/** Aligned rows (`m:eqArr`). */
export interface EquationArrayNode {
    kind: 'equationArray';
    rows: MathNode[];
}

/** Framed content (`m:borderBox`). */
export interface BoxedNode {
    kind: 'boxed';
    base: MathNode;
}

/** Invisible content that still takes space (`m:phant`). */
export interface PhantomNode {
    kind: 'phantom';
    base: MathNode;
}

/**
 * A subtree that could not be converted structurally.
 * `text` is the literal text salvaged from it, possibly empty.
 */
export interface DegradedNode {
    kind: 'degraded';
    text: string;
    reason: string;
}

/**
 * Node of the math AST.
 */
export type MathNode =
    | RunNode
    | GroupNode
    | FractionNode
    | RadicalNode
    | SuperscriptNode
    | SubscriptNode
    | SubSupNode
    | PreScriptNode
    | NaryNode
    | DelimitedNode
    | MatrixNode
    | AccentNode
    | BarNode
    | GroupCharNode
    | LimitNode
    | FunctionNode
    | EquationArrayNode
    | BoxedNode
    | PhantomNode
    | DegradedNode;

/**
 * Category of a formula diagnostic.
 */
export type DiagnosticCode =
    | 'malformed-shape'
    | 'unrecognized-node'
    | 'unrecognized-accent'
    | 'unrecognized-delimiter'
    | 'depth-exceeded'
    | 'internal-error';

/**
 * Advisory report about a formula that degraded rather than converted cleanly.
 */
export interface Diagnostic {
    /** Index of the formula in document order (0-based). */
    formulaIndex: number;
    code: DiagnosticCode;
    /** Short human readable reason. @example "m:f is missing m:den" */
    reason: string;
    /** Local name of the element the diagnostic refers to, when known. @example "f" */
    element?: string;
}

/**
 * Where a formula was found inside a Word document.
 */
export interface FormulaLocation {
    /**
     * The archive part the formula comes from.
     * @example "word/document.xml", "word/footnotes.xml"
     */
    part: string;
    /** Index of the enclosing `w:p` within the part (0-based), -1 when outside any paragraph. */
    paragraphIndex: number;
}

/**
 * One formula handed to the conversion pipeline.
 */
export interface FormulaSource {
    /** Index of the formula in document order (0-based). */
    index: number;
    /** The `m:oMath` (or `m:oMathPara`) element. */
    element: Element;
    /** True for block-level formulas, false for formulas inside running text. */
    display: boolean;
    location?: FormulaLocation;
}

/**
 * The outcome of converting one formula.
 */
export interface FormulaResult {
    index: number;
    display: boolean;
    /** LaTeX body of the formula, without math-mode delimiters. Never empty. */
    latex: string;
    /** True when at least one part of the formula was degraded. */
    degraded: boolean;
    diagnostics: Diagnostic[];
    location?: FormulaLocation;
}

/**
 * Document properties read from `docProps/core.xml`.
 */
export interface DocumentMetadata {
    title?: string;
    author?: string;
    lastModifiedBy?: string;
    created?: Date;
    modified?: Date;
}

/**
 * The result of converting every formula of a Word document.
 */
export interface DocumentMathResult {
    metadata: DocumentMetadata;
    /** Converted formulas in document order. */
    formulas: FormulaResult[];
    /** All diagnostics of all formulas, in document order. */
    diagnostics: Diagnostic[];
    /**
     * Renders every formula wrapped in its inline or display delimiters,
     * separated by the configured newline delimiter.
     */
    toLatex(): string;
}
