import { childElements } from './XmlTree.js';
import { ConfigModel, XmlElement } from './types.js';

const POSITION_ATTRIBUTES = ['x', 'y', 'z', 'a'];

function sortedAttributes(element: XmlElement): Array<[string, string]> {
    return Object.entries(element.attributes).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Structural fingerprint of an element and all of its descendants. Attribute
 * order, surrounding whitespace and comments do not contribute.
 */
export function deepSignature(element: XmlElement): string {
    return JSON.stringify(signatureTuple(element));
}

type SignatureTuple = [string, Array<[string, string]>, string, SignatureTuple[]];

function signatureTuple(element: XmlElement): SignatureTuple {
    return [
        element.tag,
        sortedAttributes(element),
        element.text.trim(),
        childElements(element).map(signatureTuple)
    ];
}

export function isSpatial(element: XmlElement): boolean {
    if (element.attributes.pos !== undefined) return true;
    return element.attributes.x !== undefined && element.attributes.z !== undefined;
}

function placement(element: XmlElement): string {
    if (element.attributes.pos !== undefined) {
        const pos = element.attributes.pos.trim().split(/\s+/).join(' ');
        return `@${pos}:${element.attributes.a ?? ''}`;
    }
    return `@${POSITION_ATTRIBUTES.map(name => element.attributes[name] ?? '').join(':')}`;
}

export function positionSignature(element: XmlElement): string {
    return `${element.tag}${placement(element)}`;
}

function structuralKey(element: XmlElement): string {
    const attrs = sortedAttributes(element);
    if (attrs.length === 0) return element.tag;
    return `${element.tag}[${attrs.map(([k, v]) => `${k}=${v}`).join(';')}]`;
}

/**
 * Grouping identity for "the same logical record". Positional models always
 * key on name plus placement, since one name legitimately repeats across a map.
 */
export function coarseKey(model: ConfigModel | null, element: XmlElement): string {
    const identity = model?.identityAttribute ?? null;
    const name = identity ? element.attributes[identity] : undefined;

    if (model?.positional) {
        return `${element.tag}:${name ?? ''}${placement(element)}`;
    }
    if (name !== undefined) {
        return `${element.tag}:${name}`;
    }
    if (isSpatial(element)) {
        return positionSignature(element);
    }
    return structuralKey(element);
}

/** Identity of a child inside a merged parent: placement for positions, full content otherwise. */
export function childSignature(child: XmlElement): string {
    if (isSpatial(child) && child.attributes.name === undefined) {
        return positionSignature(child);
    }
    return deepSignature(child);
}
