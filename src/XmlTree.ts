import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { XmlComment, XmlElement, XmlNode } from './types.js';

const ATTR_PREFIX = '@_';
const TEXT_NODE = '#text';
const COMMENT_NODE = '#comment';
const ATTRS_KEY = ':@';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    textNodeName: TEXT_NODE,
    commentPropName: COMMENT_NODE,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    allowBooleanAttributes: true,
    ignoreDeclaration: true,
    ignorePiTags: true
});

const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    textNodeName: TEXT_NODE,
    commentPropName: COMMENT_NODE,
    format: true,
    indentBy: '    ',
    suppressEmptyNode: true
});

export interface XmlSyntaxError {
    message: string;
    line: number;
    column: number;
}

type OrderedNode = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateXml(text: string): XmlSyntaxError | null {
    const result = XMLValidator.validate(text, { allowBooleanAttributes: true });
    if (result === true) return null;
    return { message: result.err.msg, line: result.err.line, column: result.err.col };
}

/**
 * Parses well-formed XML into top-level nodes. Callers validate first:
 * the underlying parser is lenient and does not reject broken input.
 */
export function parseNodes(text: string): XmlNode[] {
    const parsed: unknown = parser.parse(text);
    return fromOrdered(parsed);
}

function fromOrdered(nodes: unknown): XmlNode[] {
    if (!Array.isArray(nodes)) return [];

    const result: XmlNode[] = [];
    for (const node of nodes) {
        if (!isRecord(node)) continue;
        const converted = convertNode(node);
        if (converted) result.push(converted);
    }
    return result;
}

function textOf(nodes: unknown): string {
    if (!Array.isArray(nodes)) return '';
    return nodes
        .filter(isRecord)
        .map(n => (TEXT_NODE in n ? String(n[TEXT_NODE]) : ''))
        .join('');
}

function convertNode(node: OrderedNode): XmlNode | null {
    if (COMMENT_NODE in node) {
        const comment: XmlComment = { type: 'comment', text: textOf(node[COMMENT_NODE]) };
        return comment;
    }

    const tag = Object.keys(node).find(key => key !== ATTRS_KEY && key !== TEXT_NODE);
    if (!tag || tag.startsWith('?') || tag.startsWith('!')) return null;

    const attributes: Record<string, string> = {};
    const rawAttrs = node[ATTRS_KEY];
    if (isRecord(rawAttrs)) {
        for (const [key, value] of Object.entries(rawAttrs)) {
            if (!key.startsWith(ATTR_PREFIX)) continue;
            // Boolean attributes come back as `true`; keep them as empty strings.
            attributes[key.slice(ATTR_PREFIX.length)] = value === true ? '' : String(value);
        }
    }

    const rawChildren = node[tag];
    const element: XmlElement = {
        type: 'element',
        tag,
        attributes,
        text: textOf(rawChildren).trim(),
        children: fromOrdered(rawChildren)
    };
    return element;
}

function toOrdered(node: XmlNode): OrderedNode {
    if (node.type === 'comment') {
        return { [COMMENT_NODE]: [{ [TEXT_NODE]: node.text }] };
    }

    const children: OrderedNode[] = [];
    if (node.text) {
        children.push({ [TEXT_NODE]: node.text });
    }
    for (const child of node.children) {
        children.push(toOrdered(child));
    }

    const ordered: OrderedNode = { [node.tag]: children };
    const attrNames = Object.keys(node.attributes);
    if (attrNames.length > 0) {
        const attrs: Record<string, string> = {};
        for (const name of attrNames) {
            attrs[`${ATTR_PREFIX}${name}`] = node.attributes[name];
        }
        ordered[ATTRS_KEY] = attrs;
    }
    return ordered;
}

export function serializeNode(node: XmlNode): string {
    const output: string = builder.build([toOrdered(node)]);
    return output.trim();
}

export function buildDocument(root: XmlElement): string {
    return `${XML_DECLARATION}\n${serializeNode(root)}\n`;
}

export function createElement(tag: string, attributes: Record<string, string> = {}): XmlElement {
    return { type: 'element', tag, attributes: { ...attributes }, text: '', children: [] };
}

export function createComment(text: string): XmlComment {
    // `--` may not appear inside an XML comment.
    return { type: 'comment', text: ` ${text.replace(/-{2,}/g, '-')} ` };
}

export function cloneElement(element: XmlElement): XmlElement {
    return {
        type: 'element',
        tag: element.tag,
        attributes: { ...element.attributes },
        text: element.text,
        children: element.children.map(child =>
            child.type === 'element' ? cloneElement(child) : { ...child }
        )
    };
}

export function childElements(element: XmlElement): XmlElement[] {
    return element.children.filter((child): child is XmlElement => child.type === 'element');
}

export function hasInterleavedComments(element: XmlElement): boolean {
    const kinds = element.children.map(child => child.type);
    const firstElement = kinds.indexOf('element');
    const lastElement = kinds.lastIndexOf('element');
    if (firstElement === -1) return false;
    return kinds.slice(firstElement, lastElement).includes('comment');
}
