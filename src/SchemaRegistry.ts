import { basename } from 'path';
import { ConfigModel, MergeStrategy } from './types.js';

const KNOWN_MAPS = new Set([
    'chernarus', 'chernarusplus', 'enoch', 'livonia', 'sakhal', 'namalsk',
    'deer_isle', 'deerisle', 'esseker', 'takistan', 'banov', 'chiemsee',
    'rostow', 'valning'
]);

function model(
    id: string,
    filename: string,
    rootTag: string,
    entryTag: string | null,
    identityAttribute: string | null,
    mergeStrategy: MergeStrategy,
    mergeableChildFields: string[],
    filenamePatterns: RegExp[],
    description: string,
    flags: { positional?: boolean; preserveFilename?: boolean } = {}
): ConfigModel {
    return Object.freeze({
        id,
        filename,
        rootTag,
        entryTag,
        identityAttribute,
        mergeStrategy,
        mergeableChildFields: Object.freeze([...mergeableChildFields]),
        positional: flags.positional ?? false,
        preserveFilename: flags.preserveFilename ?? false,
        filenamePatterns: Object.freeze([...filenamePatterns]),
        description
    });
}

// Pattern order matters: 'spawnabletypes' must win over the generic 'types' fragment rule.
export const CONFIG_MODELS: readonly ConfigModel[] = Object.freeze([
    model('spawnabletypes', 'cfgspawnabletypes.xml', 'spawnabletypes', 'type', 'name', 'append',
        ['attachments', 'cargo', 'item'],
        [/spawnabletypes.*\.xml$/],
        'Spawnable attachments and cargo per item'),
    model('randompresets', 'cfgrandompresets.xml', 'randompresets', 'cargo', 'name', 'merge_children',
        ['item'],
        [/randompresets.*\.xml$/],
        'Random cargo and attachment presets'),
    model('eventspawns', 'cfgeventspawns.xml', 'eventposdef', 'event', 'name', 'merge_children',
        ['pos'],
        [/eventspawns.*\.xml$/],
        'Event spawn positions'),
    model('eventgroups', 'cfgeventgroups.xml', 'eventgroupdef', 'group', 'name', 'merge_children',
        ['child'],
        [/eventgroups.*\.xml$/],
        'Grouped event object layouts'),
    model('ignorelist', 'cfgignorelist.xml', 'ignore', 'type', 'name', 'append',
        [],
        [/ignorelist.*\.xml$/],
        'Items ignored by the central economy'),
    model('weather', 'cfgweather.xml', 'weather', null, null, 'replace',
        [],
        [/weather.*\.xml$/],
        'Weather sections'),
    model('economycore', 'cfgeconomycore.xml', 'economycore', null, 'name', 'merge_children',
        ['rootclass', 'default', 'file'],
        [/economycore.*\.xml$/],
        'Economy root classes, defaults and extra ce files'),
    model('environment', 'cfgenvironment.xml', 'env', 'territories', 'name', 'merge_children',
        ['file', 'territory'],
        [/environment.*\.xml$/],
        'Territory files and animal territories'),
    model('globals', 'globals.xml', 'variables', 'var', 'name', 'skip',
        [],
        [/globals.*\.xml$/],
        'Server-wide economy variables'),
    model('types', 'types.xml', 'types', 'type', 'name', 'replace',
        ['category', 'tag', 'usage', 'value'],
        [/^types\.xml$/, /_types\.xml$/, /types.*\.xml$/],
        'Item spawn and lifetime catalogue'),
    model('events', 'events.xml', 'events', 'event', 'name', 'merge_children',
        ['children', 'child', 'pos'],
        [/events.*\.xml$/],
        'Dynamic event definitions'),
    model('mapgroup', 'mapgrouppos.xml', 'map', 'group', 'name', 'append',
        [],
        [/^mapgroupcluster.*\.xml$/, /^mapgrouppos\.xml$/, /^mapgroupdirt\.xml$/],
        'Map group placements',
        { positional: true, preserveFilename: true }),
    model('mapproto', 'mapgroupproto.xml', 'prototype', 'group', 'name', 'merge_children',
        ['default', 'export'],
        [/^mapgroupproto\.xml$/, /^mapclusterproto\.xml$/],
        'Map group and cluster prototypes',
        { preserveFilename: true })
]);

export function detectMapName(filename: string): string | null {
    const match = /_([a-z_]+)\.xml$/i.exec(basename(filename));
    if (!match) return null;

    const candidate = match[1].toLowerCase();
    // cfgeventspawns_deer_isle.xml: the suffix may itself contain underscores.
    for (const map of KNOWN_MAPS) {
        if (candidate === map || candidate.endsWith(`_${map}`)) return map;
    }
    return null;
}

export function stripMapSuffix(filename: string): string {
    const name = basename(filename);
    const map = detectMapName(name);
    if (!map) return name;
    return name.slice(0, name.length - `_${map}.xml`.length) + '.xml';
}

export class SchemaRegistry {
    private models: readonly ConfigModel[];

    constructor(models: readonly ConfigModel[] = CONFIG_MODELS) {
        this.models = models;
    }

    list(): readonly ConfigModel[] {
        return this.models;
    }

    byId(id: string): ConfigModel | null {
        return this.models.find(m => m.id === id) ?? null;
    }

    /** Exact canonical filename, case-insensitive, ignoring a known map suffix. */
    modelForFilename(name: string): ConfigModel | null {
        const base = stripMapSuffix(name).toLowerCase();
        return this.models.find(m => m.filename === base) ?? null;
    }

    modelForRootTag(tag: string): ConfigModel | null {
        const lower = tag.toLowerCase();
        return this.models.find(m => m.rootTag === lower) ?? null;
    }

    modelForFilenamePattern(name: string): ConfigModel | null {
        const base = stripMapSuffix(name).toLowerCase();
        for (const candidate of this.models) {
            if (candidate.filenamePatterns.some(pattern => pattern.test(base))) {
                return candidate;
            }
        }
        return null;
    }

    /**
     * Exact filename first, then the parsed root tag, then loose filename patterns
     * such as `bandit_types.xml`.
     */
    resolve(filename: string, rootTag: string | null): ConfigModel | null {
        return this.modelForFilename(filename)
            ?? (rootTag ? this.modelForRootTag(rootTag) : null)
            ?? this.modelForFilenamePattern(filename);
    }

    /**
     * Best guess from raw text, used only to pick fallback tags when a file
     * does not parse as-is.
     */
    modelForContent(filename: string, content: string): ConfigModel | null {
        const byName = this.modelForFilename(filename) ?? this.modelForFilenamePattern(filename);
        if (byName) return byName;

        const text = content.toLowerCase();
        for (const candidate of this.models) {
            if (new RegExp(`<${candidate.rootTag}[\\s>]`).test(text)) return candidate;
        }

        const spawnableHints = ['<attachments', '<cargo', '<damage', '<hoarder']
            .filter(tag => text.includes(tag)).length;
        const typesHints = ['<nominal', '<lifetime', '<restock', '<quantmin', '<quantmax', '<cost', '<flags', '<category', '<usage']
            .filter(tag => text.includes(tag)).length;

        if (text.includes('<type') && spawnableHints > typesHints && spawnableHints >= 1) {
            return this.byId('spawnabletypes');
        }
        if (text.includes('<type') && typesHints >= 1) {
            return this.byId('types');
        }
        if (text.includes('<event ')) {
            return this.byId('events');
        }
        return null;
    }

    /**
     * Mission file a source file merges into. Map-suffixed files and loose
     * fragments target the canonical file; numbered map files keep their name.
     */
    targetFilenameFor(sourceName: string, model: ConfigModel): string {
        const base = stripMapSuffix(sourceName).toLowerCase();
        if (base === model.filename) return model.filename;
        if (model.preserveFilename && model.filenamePatterns.some(pattern => pattern.test(base))) {
            return base;
        }
        return model.filename;
    }
}

export const schemaRegistry = new SchemaRegistry();

export function permitsMultiSelection(strategy: MergeStrategy): boolean {
    switch (strategy) {
        case 'merge_children':
        case 'append':
            return true;
        case 'replace':
        case 'skip':
            return false;
        default: {
            const unreachable: never = strategy;
            throw new Error(`Unknown merge strategy: ${String(unreachable)}`);
        }
    }
}
