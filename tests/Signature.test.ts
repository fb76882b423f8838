import { describe, it, expect } from 'vitest';
import { schemaRegistry } from '../src/SchemaRegistry.js';
import { childSignature, coarseKey, deepSignature, positionSignature } from '../src/Signature.js';
import { ConfigModel } from '../src/types.js';
import { element } from './helpers.js';

function model(id: string): ConfigModel {
    const found = schemaRegistry.byId(id);
    if (!found) throw new Error(`unknown model ${id}`);
    return found;
}

describe('deepSignature', () => {
    it('is reflexive', () => {
        const deer = element('<type name="Deer"><nominal>6</nominal></type>');
        expect(deepSignature(deer)).toBe(deepSignature(deer));
    });

    it('ignores attribute order', () => {
        expect(deepSignature(element('<type name="A" tier="1"/>')))
            .toBe(deepSignature(element('<type tier="1" name="A"/>')));
    });

    it('ignores whitespace-only formatting', () => {
        const spaced = element('<type name="A">\n    <nominal> 6 </nominal>\n</type>');
        const compact = element('<type name="A"><nominal>6</nominal></type>');
        expect(deepSignature(spaced)).toBe(deepSignature(compact));
    });

    it('ignores comments', () => {
        expect(deepSignature(element('<type name="A"><!-- note --><nominal>6</nominal></type>')))
            .toBe(deepSignature(element('<type name="A"><nominal>6</nominal></type>')));
    });

    it('detects differences at any depth', () => {
        const a = element('<event name="E"><children><child type="Car"><part x="1"/></child></children></event>');
        const b = element('<event name="E"><children><child type="Car"><part x="2"/></child></children></event>');
        expect(deepSignature(a)).not.toBe(deepSignature(b));
    });

    it('detects text and child order differences', () => {
        expect(deepSignature(element('<type name="A"><nominal>6</nominal></type>')))
            .not.toBe(deepSignature(element('<type name="A"><nominal>10</nominal></type>')));
        expect(deepSignature(element('<type name="A"><min>1</min><max>2</max></type>')))
            .not.toBe(deepSignature(element('<type name="A"><max>2</max><min>1</min></type>')));
    });
});

describe('coarseKey', () => {
    it('uses the identity attribute when present', () => {
        expect(coarseKey(model('types'), element('<type name="Deer"><nominal>6</nominal></type>'))).toBe('type:Deer');
    });

    it('falls back to tag and sorted attributes', () => {
        expect(coarseKey(model('types'), element('<type tier="1" kind="x"/>'))).toBe('type[kind=x;tier=1]');
    });

    it('uses the bare tag for attribute-less sections', () => {
        expect(coarseKey(model('weather'), element('<overcast><current actual="0.45"/></overcast>'))).toBe('overcast');
    });

    it('keys unnamed spatial elements by position', () => {
        expect(coarseKey(model('eventspawns'), element('<pos x="1" z="2" a="0"/>'))).toBe('pos@1::2:0');
    });

    it('keys positional models on name and position', () => {
        const mapgroup = model('mapgroup');
        expect(coarseKey(mapgroup, element('<group name="Land_Shed" pos="100.5 10 200.25" a="90"/>')))
            .toBe('group:Land_Shed@100.5 10 200.25:90');
        expect(coarseKey(mapgroup, element('<group name="Land_Shed" pos="100.5  10 200.25" a="90"/>')))
            .toBe('group:Land_Shed@100.5 10 200.25:90');
    });

    it('works without a model', () => {
        expect(coarseKey(null, element('<entry name="A"/>'))).toBe('entry[name=A]');
    });
});

describe('childSignature', () => {
    it('uses placement for unnamed positions regardless of attribute order', () => {
        const a = element('<pos x="1" y="5" z="2"/>');
        const b = element('<pos z="2" x="1" y="5"/>');
        expect(childSignature(a)).toBe(positionSignature(a));
        expect(childSignature(a)).toBe(childSignature(b));
    });

    it('uses the full content for named children', () => {
        const item = element('<item name="Apple" chance="0.5"/>');
        expect(childSignature(item)).toBe(deepSignature(item));
    });
});
