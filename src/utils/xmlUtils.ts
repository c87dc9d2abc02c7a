/**
 * XML Parsing Utilities
 *
 * Helpers for parsing WordprocessingML parts and navigating Office Math (OMML) trees.
 *
 * OMML elements live in the `http://schemas.openxmlformats.org/officeDocument/2006/math`
 * namespace, conventionally bound to the `m:` prefix. The helpers here match on
 * namespace and local name so that documents using another prefix still work.
 *
 * @module xmlUtils
 */

import { DOMParser } from '@xmldom/xmldom';
import { DocumentMetadata } from '../types';

/** Namespace of Office Math Markup Language. */
export const MATH_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/math';

/** Namespace of WordprocessingML. */
export const WORD_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

const ELEMENT_NODE = 1;

/**
 * Parses an XML string into a DOM Document object.
 *
 * Uses the @xmldom/xmldom library, since Node.js has no built-in DOM parser.
 *
 * @example
 * ```typescript
 * const doc = parseXmlString('<m:oMath xmlns:m="...">...</m:oMath>');
 * const math = doc.documentElement;
 * ```
 */
export const parseXmlString = (xml: string): Document => {
    const parser = new DOMParser();
    return parser.parseFromString(xml, "text/xml");
};

/**
 * Gets all elements with a specific qualified tag name as an array.
 */
export const getElementsByTagName = (element: Element | Document, tagName: string): Element[] => {
    return Array.from(element.getElementsByTagName(tagName));
};

export const isElement = (node: Node): node is Element => node.nodeType === ELEMENT_NODE;

/**
 * Whether an element belongs to the OMML namespace.
 * A bare `m:` prefix without a namespace declaration is accepted as well.
 */
export const isMathElement = (element: Element): boolean => {
    if (element.namespaceURI === MATH_NS) return true;
    return !element.namespaceURI && element.prefix === 'm';
};

/**
 * Local name of an element (`f` for `<m:f>`).
 */
export const getLocalName = (element: Element): string => {
    return element.localName || element.nodeName.replace(/^.*:/, '');
};

/**
 * Gets the direct child elements, in document order.
 */
export const getChildElements = (parent: Element): Element[] => {
    const result: Element[] = [];
    if (!parent.childNodes) return result;

    for (let i = 0; i < parent.childNodes.length; i++) {
        const child = parent.childNodes[i];
        if (isElement(child)) {
            result.push(child);
        }
    }
    return result;
};

/**
 * Gets direct OMML child elements with a specific local name.
 * Unlike getElementsByTagName, this does not search recursively.
 *
 * @example
 * ```typescript
 * const rows = getMathChildren(matrix, 'mr');
 * ```
 */
export const getMathChildren = (parent: Element, localName: string): Element[] => {
    return getChildElements(parent).filter(child => isMathElement(child) && getLocalName(child) === localName);
};

/**
 * Gets the first direct OMML child element with a specific local name.
 */
export const getMathChild = (parent: Element, localName: string): Element | undefined => {
    return getMathChildren(parent, localName)[0];
};

/**
 * Reads the `m:val` attribute of an OMML property element.
 * Falls back to an unprefixed `val` attribute.
 *
 * @returns The attribute value, or undefined when the attribute is absent
 */
export const getMathVal = (element: Element): string | undefined => {
    if (element.hasAttributeNS(MATH_NS, 'val')) {
        return element.getAttributeNS(MATH_NS, 'val') ?? undefined;
    }
    for (const name of ['m:val', 'val']) {
        if (element.hasAttribute(name)) {
            return element.getAttribute(name) ?? undefined;
        }
    }
    return undefined;
};

/**
 * Reads an OMML on/off property such as `<m:degHide/>` or `<m:degHide m:val="1"/>`.
 *
 * @returns true when the property is present and not switched off
 */
export const getMathFlag = (props: Element | undefined, localName: string): boolean => {
    if (!props) return false;
    const flag = getMathChild(props, localName);
    if (!flag) return false;
    const val = getMathVal(flag);
    return val === undefined || val === '1' || val === 'on' || val === 'true';
};

/**
 * Reads the value of an OMML property child (`<m:chr m:val="∑"/>` inside `m:naryPr`).
 *
 * @returns The value, or undefined when the property element is absent
 */
export const getMathProperty = (props: Element | undefined, localName: string): string | undefined => {
    if (!props) return undefined;
    const prop = getMathChild(props, localName);
    if (!prop) return undefined;
    return getMathVal(prop) ?? '';
};

/**
 * Concatenates the text of every `m:t` element below `element`, in document order.
 * This is what a degraded subtree is reduced to.
 */
export const getMathText = (element: Element): string => {
    if (isMathElement(element) && getLocalName(element) === 't') {
        return element.textContent ?? '';
    }
    return getElementsByTagName(element, '*')
        .filter(el => isMathElement(el) && getLocalName(el) === 't')
        .map(el => el.textContent ?? '')
        .join('');
};

/**
 * Parses OOXML document metadata from the docProps/core.xml part.
 *
 * The part follows the Dublin Core metadata standard with OOXML-specific extensions:
 * - dc:title - Document title
 * - dc:creator - Original author
 * - cp:lastModifiedBy - User who last modified the document
 * - dcterms:created / dcterms:modified - Timestamps
 *
 * @param xmlContent - The raw XML content of docProps/core.xml
 * @returns The extracted properties (empty object when none are present)
 */
export const parseDocumentMetadata = (xmlContent: string): DocumentMetadata => {
    const xml = parseXmlString(xmlContent);
    const metadata: DocumentMetadata = {};

    const coreProperties = getElementsByTagName(xml, "cp:coreProperties")[0];
    if (!coreProperties) return metadata;

    const textOf = (tagName: string): string | undefined => {
        const node = getElementsByTagName(coreProperties, tagName)[0];
        return node && node.textContent ? node.textContent : undefined;
    };

    const title = textOf("dc:title");
    if (title) metadata.title = title;

    const author = textOf("dc:creator");
    if (author) metadata.author = author;

    const lastModifiedBy = textOf("cp:lastModifiedBy");
    if (lastModifiedBy) metadata.lastModifiedBy = lastModifiedBy;

    const created = textOf("dcterms:created");
    if (created) metadata.created = new Date(created);

    const modified = textOf("dcterms:modified");
    if (modified) metadata.modified = new Date(modified);

    return metadata;
};
