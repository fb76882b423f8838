import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { ConflictResolver } from '../src/ConflictResolver.js';
import { PreviewConsumedError, UnresolvedConflictError } from '../src/errors.js';
import { MergeExecutor, pendingTargets, spliceEntries } from '../src/MergeExecutor.js';
import { MergePreviewEngine } from '../src/MergePreviewEngine.js';
import { schemaRegistry } from '../src/SchemaRegistry.js';
import { childElements, createComment, createElement } from '../src/XmlTree.js';
import { ConfigEntry, ConfigModel, MergePreview, MergeResult } from '../src/types.js';
import { element, entriesFrom, makePreview, makeTempDir, removeDir, writeFiles } from './helpers.js';

const DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

function model(id: string): ConfigModel {
    const found = schemaRegistry.byId(id);
    if (!found) throw new Error(`unknown model ${id}`);
    return found;
}

function document(...lines: string[]): string {
    return [DECLARATION, ...lines].join('\n') + '\n';
}

describe('spliceEntries', () => {
    it('puts replacements where the first superseded element stood', () => {
        const root = createElement('types');
        root.children.push(
            element('<type name="A"/>'),
            element('<type name="B"/>'),
            element('<type name="A"><nominal>2</nominal></type>'),
            element('<type name="C"/>')
        );

        const removed = spliceEntries(root, model('types'), new Map([
            ['type:A', [element('<type name="A" replaced="1"/>')]],
            ['type:D', [element('<type name="D"/>')]]
        ]));

        expect(removed).toBe(2);
        expect(childElements(root).map(child => child.attributes.name)).toEqual(['A', 'B', 'C', 'D']);
        expect(childElements(root)[0].attributes.replaced).toBe('1');
    });

    it('drops the source note of a superseded element but keeps other comments', () => {
        const root = createElement('types');
        root.children.push(
            createComment('wildlife'),
            createComment('Added from @A'),
            element('<type name="A"/>'),
            element('<type name="B"/>')
        );

        spliceEntries(root, model('types'), new Map([
            ['type:A', [createComment('Resolved (replace) from @B'), element('<type name="A" replaced="1"/>')]]
        ]));

        expect(root.children.map(node => node.type === 'comment' ? node.text.trim() : node.attributes.name)).toEqual([
            'wildlife', 'Resolved (replace) from @B', 'A', 'B'
        ]);
    });
});

describe('MergeExecutor', () => {
    const engine = new MergePreviewEngine();
    const executor = new MergeExecutor();
    let missionPath: string;

    beforeEach(async () => {
        missionPath = await makeTempDir('executor-test-');
    });

    afterEach(async () => {
        await removeDir(missionPath);
    });

    async function previewFor(filename: string, modelId: string, candidates: ConfigEntry[]): Promise<MergeResult> {
        const config = model(modelId);
        const target = await engine.loadTarget(join(missionPath, filename), config);
        return engine.preview(target, candidates, config, filename);
    }

    async function read(filename: string): Promise<string> {
        return readFile(join(missionPath, filename), 'utf-8');
    }

    it('creates a missing mission file with annotated entries', async () => {
        const result = await previewFor('types.xml', 'types',
            entriesFrom('<types><type name="Deer"><nominal>6</nominal></type></types>', '/mods/@A/types.xml', '@A'));

        const report = await executor.execute(makePreview(missionPath, [result]));

        expect(report.files[0].status).toBe('written');
        expect(report.files[0].counts.new).toBe(1);
        expect(await read('types.xml')).toBe(document(
            '<types>',
            '    <!-- Added from @A -->',
            '    <type name="Deer">',
            '        <nominal>6</nominal>',
            '    </type>',
            '</types>'
        ));
    });

    it('writes an identical group once, attributed to its first mod', async () => {
        const result = await previewFor('types.xml', 'types', [
            ...entriesFrom('<types><type name="Deer"/></types>', '/mods/@A/types.xml', '@A'),
            ...entriesFrom('<types><type name="Deer"/></types>', '/mods/@B/types.xml', '@B')
        ]);

        const report = await executor.execute(makePreview(missionPath, [result]));

        expect(report.files[0].counts).toEqual({ new: 0, duplicate: 1, conflict: 0, merged: 0, forced: 0, removed: 0 });
        expect(await read('types.xml')).toBe(document(
            '<types>',
            '    <!-- Added from @A -->',
            '    <type name="Deer"/>',
            '</types>'
        ));
    });

    it('replaces a resolved entry in place', async () => {
        await writeFiles(missionPath, {
            'types.xml': [
                '<types>',
                '    <type name="Wolf"><nominal>4</nominal></type>',
                '    <type name="Boar"><nominal>1</nominal></type>',
                '    <type name="Fox"/>',
                '</types>'
            ].join('\n')
        });
        const result = await previewFor('types.xml', 'types',
            entriesFrom('<types><type name="Boar"><nominal>5</nominal></type></types>', '/mods/@B/types.xml', '@B'));
        const preview = makePreview(missionPath, [result]);
        new ConflictResolver(preview).selectByIds('types.xml', 'type:Boar', ['@B:types.xml#0'], 'replace');

        const report = await executor.execute(preview, { annotate: false });

        expect(report.files[0].counts).toEqual({ new: 0, duplicate: 0, conflict: 1, merged: 0, forced: 0, removed: 1 });
        expect(await read('types.xml')).toBe(document(
            '<types>',
            '    <type name="Wolf">',
            '        <nominal>4</nominal>',
            '    </type>',
            '    <type name="Boar">',
            '        <nominal>5</nominal>',
            '    </type>',
            '    <type name="Fox"/>',
            '</types>'
        ));
    });

    it('replaces the note an earlier run wrote above a superseded entry', async () => {
        await writeFiles(missionPath, {
            'types.xml': document(
                '<types>',
                '    <!-- Added from @A -->',
                '    <type name="Boar">',
                '        <nominal>1</nominal>',
                '    </type>',
                '</types>'
            )
        });
        const result = await previewFor('types.xml', 'types',
            entriesFrom('<types><type name="Boar"><nominal>5</nominal></type></types>', '/mods/@B/types.xml', '@B'));
        const preview = makePreview(missionPath, [result]);
        new ConflictResolver(preview).selectByIds('types.xml', 'type:Boar', ['@B:types.xml#0'], 'replace');

        await executor.execute(preview);

        expect(await read('types.xml')).toBe(document(
            '<types>',
            '    <!-- Resolved (replace) from @B -->',
            '    <type name="Boar">',
            '        <nominal>5</nominal>',
            '    </type>',
            '</types>'
        ));
    });

    it('writes the union of merged entries', async () => {
        await writeFiles(missionPath, {
            'events.xml': '<events><event name="Wolf"><nominal>5</nominal><pos x="1" z="1"/></event></events>'
        });
        const result = await previewFor('events.xml', 'events',
            entriesFrom('<events><event name="Wolf"><nominal>9</nominal><pos x="2" z="2"/></event></events>',
                '/mods/@A/events.xml', '@A'));
        const preview = makePreview(missionPath, [result]);
        new ConflictResolver(preview).selectByIds('events.xml', 'event:Wolf', ['@A:events.xml#0', 'target:events.xml#0'], 'merge');

        const report = await executor.execute(preview);

        expect(report.files[0].counts.merged).toBe(1);
        expect(await read('events.xml')).toBe(document(
            '<events>',
            '    <!-- Merged from @A -->',
            '    <event name="Wolf">',
            '        <nominal>9</nominal>',
            '        <pos x="2" z="2"/>',
            '        <pos x="1" z="1"/>',
            '    </event>',
            '</events>'
        ));
    });

    describe('unresolved conflicts', () => {
        const original = '<types><type name="Boar"><nominal>1</nominal></type></types>';

        async function conflictPreview(): Promise<MergePreview> {
            await writeFiles(missionPath, { 'types.xml': original });
            const result = await previewFor('types.xml', 'types', [
                ...entriesFrom('<types><type name="Boar"><nominal>2</nominal></type></types>', '/mods/@A/types.xml', '@A'),
                ...entriesFrom('<types><type name="Boar"><nominal>5</nominal></type></types>', '/mods/@B/types.xml', '@B')
            ]);
            return makePreview(missionPath, [result]);
        }

        it('refuses to write anything', async () => {
            const preview = await conflictPreview();

            await expect(executor.execute(preview)).rejects.toBeInstanceOf(UnresolvedConflictError);
            expect(await read('types.xml')).toBe(original);
            expect(preview.consumed).toBe(false);
        });

        it('forces a pick when asked', async () => {
            const preview = await conflictPreview();

            const report = await executor.execute(preview, { includeUnresolvedConflicts: true, forcedPick: 'last' });

            expect(report.files[0].counts.forced).toBe(1);
            expect(await read('types.xml')).toBe(document(
                '<types>',
                '    <!-- Forced from @B -->',
                '    <type name="Boar">',
                '        <nominal>5</nominal>',
                '    </type>',
                '</types>'
            ));
        });

        it('forces the first mod candidate by default', async () => {
            const preview = await conflictPreview();

            await executor.execute(preview, { includeUnresolvedConflicts: true, annotate: false });

            expect(await read('types.xml')).toContain('<nominal>2</nominal>');
        });
    });

    it('executes a preview only once', async () => {
        const result = await previewFor('types.xml', 'types',
            entriesFrom('<types><type name="Deer"/></types>', '/mods/@A/types.xml', '@A'));
        const preview = makePreview(missionPath, [result]);

        await executor.execute(preview);

        await expect(executor.execute(preview)).rejects.toBeInstanceOf(PreviewConsumedError);
    });

    it('reports a failing file without stopping the others', async () => {
        await mkdir(join(missionPath, 'events.xml'));
        const types = await previewFor('types.xml', 'types',
            entriesFrom('<types><type name="Deer"/></types>', '/mods/@A/types.xml', '@A'));
        const broken = engine.preview(null,
            entriesFrom('<events><event name="Wolf"/></events>', '/mods/@A/events.xml', '@A'),
            model('events'), 'events.xml');

        const report = await executor.execute(makePreview(missionPath, [broken, types]));

        expect(report.files.map(file => [file.targetFilename, file.status])).toEqual([
            ['events.xml', 'failed'],
            ['types.xml', 'written']
        ]);
        expect(report.files[0].error).toBeDefined();
        expect((await readdir(missionPath)).sort()).toEqual(['events.xml', 'types.xml']);
    });

    it('marks every file cancelled when aborted before the first write', async () => {
        const result = await previewFor('types.xml', 'types',
            entriesFrom('<types><type name="Deer"/></types>', '/mods/@A/types.xml', '@A'));
        const controller = new AbortController();
        controller.abort();

        const report = await executor.execute(makePreview(missionPath, [result]), { signal: controller.signal });

        expect(report.cancelled).toBe(true);
        expect(report.files.map(file => file.status)).toEqual(['cancelled']);
        expect(await readdir(missionPath)).toEqual([]);
    });

    it('keeps mission values of skipped groups and leaves the file alone', async () => {
        const original = '<variables><var name="ZombieMaxCount" type="0" value="1000"/></variables>';
        await writeFiles(missionPath, { 'globals.xml': original });
        const result = await previewFor('globals.xml', 'globals',
            entriesFrom('<variables><var name="ZombieMaxCount" type="0" value="2000"/></variables>', '/mods/@A/globals.xml', '@A'));
        const preview = makePreview(missionPath, [result]);

        expect(pendingTargets(preview)).toEqual([]);
        const report = await executor.execute(preview);

        expect(report.files[0].status).toBe('unchanged');
        expect(await read('globals.xml')).toBe(original);
    });

    it('copies unknown files when enabled', async () => {
        const sourceDir = await makeTempDir('executor-source-');
        try {
            await writeFiles(sourceDir, { 'notes.xml': '<notes><line>hello</line></notes>' });
            const preview = makePreview(missionPath, []);
            preview.copyOnly.push({ sourcePath: join(sourceDir, 'notes.xml'), sourceMod: '@C', targetFilename: 'notes.xml' });

            const report = await executor.execute(preview);

            expect(report.copied).toEqual([{
                sourcePath: join(sourceDir, 'notes.xml'),
                targetPath: join(missionPath, 'notes.xml'),
                status: 'written'
            }]);
            expect(await read('notes.xml')).toBe('<notes><line>hello</line></notes>');
        } finally {
            await removeDir(sourceDir);
        }
    });

    it('reports progress per file', async () => {
        const types = await previewFor('types.xml', 'types',
            entriesFrom('<types><type name="Deer"/></types>', '/mods/@A/types.xml', '@A'));
        const events = await previewFor('events.xml', 'events',
            entriesFrom('<events><event name="Wolf"/></events>', '/mods/@A/events.xml', '@A'));
        const files: string[] = [];

        await executor.execute(makePreview(missionPath, [types, events]), {
            onProgress: ({ current, total, file }) => files.push(`${current}/${total} ${file}`)
        });

        expect(files).toEqual(['1/2 types.xml', '2/2 events.xml']);
    });
});
