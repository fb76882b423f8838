import { readFile } from 'fs/promises';
import { basename } from 'path';
import { ParseError } from './errors.js';
import { SchemaRegistry, schemaRegistry } from './SchemaRegistry.js';
import { coarseKey, deepSignature } from './Signature.js';
import {
    childElements,
    createElement,
    hasInterleavedComments,
    parseNodes,
    validateXml,
    XmlSyntaxError
} from './XmlTree.js';
import { ConfigEntry, ConfigModel, ParsedDocument, ParseWarning, XmlElement } from './types.js';

export interface ParseOutcome {
    document: ParsedDocument;
    warnings: ReadonlySet<ParseWarning>;
}

export interface ParseOptions {
    model?: ConfigModel | null;
    // Mission files keep commented-out entries disabled; mod fragments often ship live entries in comments.
    unwrapCommentedEntries?: boolean;
}

const COMMENT_PATTERN = /<!--([\s\S]*?)-->/g;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function byteOffset(text: string, line: number, column: number): number {
    const lines = text.split('\n');
    const before = lines.slice(0, Math.max(0, line - 1));
    const current = (lines[line - 1] ?? '').slice(0, Math.max(0, column - 1));
    const prefix = before.length > 0 ? `${before.join('\n')}\n${current}` : current;
    return Buffer.byteLength(prefix, 'utf8');
}

const UTF8_BOM_BYTES = 3;

/**
 * Decodes UTF-8 without letting malformed bytes through as U+FFFD. A U+FFFD
 * that the file really spells out (EF BF BD) is kept.
 */
export function decodeUtf8(buffer: Buffer, path: string): string {
    const text = buffer.toString('utf8');
    let index = text.indexOf('\uFFFD');
    while (index !== -1) {
        const prefix = text.slice(0, index);
        const offset = Buffer.byteLength(prefix, 'utf8');
        if (buffer[offset] !== 0xef || buffer[offset + 1] !== 0xbf || buffer[offset + 2] !== 0xbd) {
            const line = prefix.split('\n').length;
            const column = index - prefix.lastIndexOf('\n');
            throw new ParseError(path, 'invalid UTF-8 byte sequence', offset, line, column);
        }
        index = text.indexOf('\uFFFD', index + 1);
    }
    return text;
}

export class FragmentParser {
    private registry: SchemaRegistry;

    constructor(registry: SchemaRegistry = schemaRegistry) {
        this.registry = registry;
    }

    async parse(path: string, options: ParseOptions = {}): Promise<ParseOutcome> {
        const content = await readFile(path);
        return this.parseText(decodeUtf8(content, path), path, options);
    }

    parseText(raw: string, path: string, options: ParseOptions = {}): ParseOutcome {
        const warnings = new Set<ParseWarning>();
        const filename = basename(path);

        let text = raw;
        let bomBytes = 0;
        if (text.startsWith('\uFEFF')) {
            text = text.slice(1);
            bomBytes = UTF8_BOM_BYTES;
            warnings.add('byte_order_mark');
        }
        const source = text;

        text = this.sanitize(text, warnings);
        const guess = options.model ?? this.registry.modelForContent(filename, text);
        if (text.trim() === '') {
            // A blank file of a known kind is an empty document, not a broken one.
            if (!guess) throw new ParseError(path, 'no XML content found', 0, 1, 1);
            return {
                document: { path, root: createElement(guess.rootTag), model: guess, warnings },
                warnings
            };
        }

        if (options.unwrapCommentedEntries ?? true) {
            const tags = guess ? [guess.entryTag, guess.rootTag].filter((t): t is string => t !== null) : [];
            text = this.unwrapCommentedEntries(text, tags, warnings);
        }
        const body = text.replace(/^\s*<\?xml[^>]*\?>\s*/i, '');

        const root = this.parseAsIs(body, guess, warnings)
            ?? this.parseWrapped(body, guess, warnings)
            ?? this.extractEntries(body, guess, warnings);

        if (!root) {
            const error: XmlSyntaxError = validateXml(source)
                ?? validateXml(body)
                ?? { message: 'no parseable elements', line: 1, column: 1 };
            const offset = bomBytes + byteOffset(source, error.line, error.column);
            throw new ParseError(path, error.message, offset, error.line, error.column);
        }

        if (hasInterleavedComments(root)) {
            warnings.add('interleaved_comments');
        }

        const model = options.model ?? this.registry.resolve(filename, root.tag === 'root' ? null : root.tag);
        return {
            document: { path, root, model, warnings },
            warnings
        };
    }

    private sanitize(input: string, warnings: Set<ParseWarning>): string {
        let text = input;

        const withoutBlocks = text.replace(/\/\*[\s\S]*?\*\//g, '');
        if (withoutBlocks !== text) warnings.add('c_style_comments');
        text = withoutBlocks;

        const withoutLines = text.replace(/^[ \t]*\/\/.*$/gm, '');
        if (withoutLines !== text) warnings.add('slash_comments');
        text = withoutLines;

        // Banner lines like <!------ LOOT ------> are not legal comments.
        text = text.replace(COMMENT_PATTERN, (match: string, inner: string) => {
            if (inner.includes('--') || inner.endsWith('-')) {
                warnings.add('malformed_comments');
                return '';
            }
            return match;
        });

        const first = text.indexOf('<');
        const last = text.lastIndexOf('>');
        if (first === -1 || last < first) return '';

        if (text.slice(0, first).trim() !== '') warnings.add('has_preamble');
        if (text.slice(last + 1).trim() !== '') warnings.add('has_postamble');
        return text.slice(first, last + 1);
    }

    private unwrapCommentedEntries(text: string, tags: string[], warnings: Set<ParseWarning>): string {
        if (tags.length === 0) return text;

        const pattern = new RegExp(`<\\s*(?:${tags.map(escapeRegExp).join('|')})\\b`, 'i');
        return text.replace(COMMENT_PATTERN, (match: string, inner: string) => {
            if (!pattern.test(inner)) return match;
            warnings.add('unwrap_comments');
            return inner;
        });
    }

    private parseAsIs(body: string, model: ConfigModel | null, warnings: Set<ParseWarning>): XmlElement | null {
        if (validateXml(body)) return null;

        const elements = parseNodes(body).filter((node): node is XmlElement => node.type === 'element');
        if (elements.length !== 1) return null;

        const root = elements[0];
        if (model?.entryTag && root.tag === model.entryTag && model.rootTag !== model.entryTag) {
            warnings.add('wrapped_single_entry');
            const synthetic = createElement(model.rootTag);
            synthetic.children.push(root);
            return synthetic;
        }
        return root;
    }

    private parseWrapped(body: string, model: ConfigModel | null, warnings: Set<ParseWarning>): XmlElement | null {
        const wrapTag = model?.rootTag ?? 'root';
        const wrapped = `<${wrapTag}>\n${body}\n</${wrapTag}>`;
        if (validateXml(wrapped)) return null;

        const elements = parseNodes(wrapped).filter((node): node is XmlElement => node.type === 'element');
        if (elements.length !== 1) return null;
        warnings.add('used_wrap_root');

        const root = elements[0];
        const blocks = childElements(root);
        // Several complete documents pasted one after another: hoist their entries.
        if (blocks.length > 0 && blocks.every(block => block.tag === wrapTag)) {
            const merged = createElement(wrapTag, blocks[0].attributes);
            for (const block of blocks) {
                merged.children.push(...block.children);
            }
            return merged;
        }
        return root;
    }

    private extractEntries(body: string, model: ConfigModel | null, warnings: Set<ParseWarning>): XmlElement | null {
        if (!model?.entryTag) return null;

        const tag = escapeRegExp(model.entryTag);
        const pattern = new RegExp(`<${tag}\\b[^>]*?/\\s*>|<${tag}\\b[^>]*>[\\s\\S]*?</${tag}\\s*>`, 'gi');

        const synthetic = createElement(model.rootTag);
        for (const match of body.matchAll(pattern)) {
            const snippet = match[0].trim();
            if (validateXml(snippet)) {
                warnings.add('partial_extraction');
                continue;
            }
            synthetic.children.push(...parseNodes(snippet).filter(node => node.type === 'element'));
        }

        if (synthetic.children.length === 0) return null;
        warnings.add('used_extract_entries');
        return synthetic;
    }
}

export const fragmentParser = new FragmentParser();

/** Every child element of the root becomes one entry, in document order. */
export function collectEntries(document: ParsedDocument, sourceMod: string, sourceFile: string): ConfigEntry[] {
    return childElements(document.root).map((element, index): ConfigEntry => ({
        id: `${sourceMod}:${sourceFile}#${index}`,
        element,
        coarseKey: coarseKey(document.model, element),
        deepSignature: deepSignature(element),
        sourceMod,
        sourceFile,
        status: 'new'
    }));
}
