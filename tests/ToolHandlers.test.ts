import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { z } from 'zod';
import { defaultConfig } from '../src/config.js';
import { OverwriteNotConfirmedError } from '../src/errors.js';
import { MergeSession } from '../src/MergeSession.js';
import { ToolHandlers } from '../src/ToolHandlers.js';
import { makeTempDir, removeDir, writeFiles } from './helpers.js';

describe('ToolHandlers', () => {
    let root: string;
    let missionPath: string;
    let handlers: ToolHandlers;

    beforeEach(async () => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});

        root = await makeTempDir('tools-test-');
        missionPath = join(root, 'mission');
        await writeFiles(root, {
            'mission/types.xml': '<types><type name="Boar"><nominal>1</nominal></type></types>',
            '@A/types.xml': '<types><type name="Boar"><nominal>2</nominal></type><type name="Deer"/></types>',
            '@B/bandit_types.xml': '<type name="Boar"><nominal>5</nominal></type>'
        });

        const session = new MergeSession({
            ...defaultConfig(),
            missionPath,
            modDirs: [join(root, '@A'), join(root, '@B')]
        });
        handlers = new ToolHandlers(session);
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await removeDir(root);
    });

    it('lists the known config models', async () => {
        const models = z.array(z.object({ id: z.string() })).parse(await handlers.callTool('listConfigModels', {}));
        expect(models).toHaveLength(13);
        expect(models[0].id).toBe('spawnabletypes');
    });

    it('rejects unknown tools and invalid arguments', async () => {
        await expect(handlers.callTool('nope', {})).rejects.toThrow('Unknown tool: nope');
        await expect(handlers.callTool('resolveConflict', { targetFilename: 'types.xml', coarseKey: 'type:Boar', entryIds: [] }))
            .rejects.toBeInstanceOf(z.ZodError);
        await expect(handlers.callTool('getConflicts', {})).rejects.toThrow('No merge preview; run previewMerge first');
    });

    it('previews, resolves and writes a merge', async () => {
        const preview = await handlers.callTool('previewMerge', {});
        expect(preview).toMatchObject({
            targets: [{
                targetFilename: 'types.xml',
                model: 'types',
                counts: { total: 3, new: 1, duplicate: 0, conflict: 1, skipped: 0 },
                newEntries: ['type:Deer'],
                conflicts: ['type:Boar']
            }]
        });

        const conflicts = await handlers.callTool('getConflicts', {});
        expect(conflicts).toMatchObject({
            count: 1,
            conflicts: [{
                coarseKey: 'type:Boar',
                strategy: 'replace',
                resolution: null,
                candidates: [
                    { id: '@A:types.xml#0', source: '@A' },
                    { id: '@B:bandit_types.xml#0', source: '@B' },
                    { id: 'target:types.xml#0', source: 'mission file' }
                ]
            }]
        });

        expect(await handlers.callTool('showEntry', { targetFilename: 'types.xml', entryId: '@B:bandit_types.xml#0' }))
            .toMatchObject({ xml: '<type name="Boar">\n    <nominal>5</nominal>\n</type>' });

        expect(await handlers.callTool('resolveConflict', {
            targetFilename: 'types.xml',
            coarseKey: 'type:Boar',
            entryIds: ['@B:bandit_types.xml#0']
        })).toEqual({ resolved: 'type:Boar: replace with @B', mode: 'replace', remaining: 0 });

        await expect(handlers.callTool('executeMerge', {})).rejects.toBeInstanceOf(OverwriteNotConfirmedError);

        const report = await handlers.callTool('executeMerge', { confirmOverwrite: true });
        expect(report).toMatchObject({ files: [{ targetFilename: 'types.xml', status: 'written' }], cancelled: false });
        expect(await readFile(join(missionPath, 'types.xml'), 'utf-8')).toBe([
            '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
            '<types>',
            '    <!-- Resolved (replace) from @B -->',
            '    <type name="Boar">',
            '        <nominal>5</nominal>',
            '    </type>',
            '    <!-- Added from @A -->',
            '    <type name="Deer"/>',
            '</types>',
            ''
        ].join('\n'));

        expect(await handlers.callTool('getStatistics', {})).toMatchObject({
            preview: null,
            lastMerge: { written: 1, failed: 0, copied: 0, cancelled: false }
        });
        expect(await handlers.callTool('findDuplicates', { filename: 'types.xml' }))
            .toEqual({ filename: 'types.xml', count: 0, groups: [] });
    });

    it('auto-resolves and clears resolutions', async () => {
        await handlers.callTool('previewMerge', {});

        expect(await handlers.callTool('autoResolve', { policy: 'mod_priority', modPriority: ['@B'] }))
            .toEqual({ resolved: 1, unresolved: {} });
        expect(await handlers.callTool('getConflicts', {})).toMatchObject({
            conflicts: [{ resolution: 'type:Boar: replace with @B' }]
        });
        expect(await handlers.callTool('getConflicts', { unresolvedOnly: true })).toEqual({ count: 0, conflicts: [] });

        expect(await handlers.callTool('clearResolution', {})).toEqual({ cleared: 1 });
        expect(await handlers.callTool('autoResolve', { policy: 'identical' }))
            .toEqual({ resolved: 0, unresolved: { 'types.xml': ['type:Boar'] } });
    });

    it('serves the tools over MCP', async () => {
        const server = new Server({ name: 'test', version: '0.0.0' }, { capabilities: { tools: {} } });
        handlers.setupTools(server);
        const client = new Client({ name: 'test-client', version: '0.0.0' });
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

        try {
            const { tools } = await client.listTools();
            expect(tools.map(tool => tool.name)).toEqual([
                'listConfigModels', 'scanMods', 'previewMerge', 'getConflicts', 'showEntry', 'resolveConflict',
                'clearResolution', 'autoResolve', 'executeMerge', 'findDuplicates', 'fixDuplicates', 'getStatistics'
            ]);

            const failed = await client.callTool({ name: 'showEntry', arguments: { targetFilename: 'types.xml' } });
            expect(failed.isError).toBe(true);
            expect(failed.content).toEqual([{ type: 'text', text: 'Error: entryId: Required' }]);
        } finally {
            await client.close();
            await server.close();
        }
    });
});
