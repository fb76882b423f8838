import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { describeError } from './errors.js';
import { DuplicateResolution } from './DuplicateFixer.js';
import { MergeSession } from './MergeSession.js';
import { serializeNode } from './XmlTree.js';
import { ConfigEntry, ConflictGroup, MergeResult } from './types.js';

const resolutionMode = z.enum(['replace', 'merge', 'keep_all']);
const pickPolicy = z.enum(['first', 'last', 'mod_priority']);

const scanArgs = z.object({
    skipMods: z.array(z.string()).optional(),
    includeUnknownSchema: z.boolean().optional()
});

const previewArgs = z.object({
    modIds: z.array(z.string()).optional(),
    files: z.array(z.string()).optional(),
    targetOverrides: z.record(z.string()).optional()
});

const conflictsArgs = z.object({
    targetFilename: z.string().optional(),
    unresolvedOnly: z.boolean().optional()
});

const showEntryArgs = z.object({
    targetFilename: z.string(),
    entryId: z.string()
});

const resolveArgs = z.object({
    targetFilename: z.string(),
    coarseKey: z.string(),
    entryIds: z.array(z.string()).min(1),
    mode: resolutionMode.default('replace')
});

const clearArgs = z.object({
    targetFilename: z.string().optional(),
    coarseKey: z.string().optional()
});

const autoResolveArgs = z.object({
    policy: z.enum(['identical', 'first', 'last', 'mod_priority']),
    modPriority: z.array(z.string()).optional()
});

const executeArgs = z.object({
    includeUnresolvedConflicts: z.boolean().optional(),
    forcedPick: pickPolicy.optional(),
    modPriority: z.array(z.string()).optional(),
    confirmOverwrite: z.boolean().optional()
});

const duplicatesArgs = z.object({
    filename: z.string()
});

const fixDuplicatesArgs = z.object({
    filename: z.string(),
    resolutions: z.array(z.object({
        coarseKey: z.string(),
        mode: resolutionMode,
        entryIds: z.array(z.string()).min(1)
    })).optional(),
    policy: pickPolicy.optional()
});

function formatZodError(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'arguments'}: ${issue.message}`)
        .join('; ');
}

export class ToolHandlers {
    private session: MergeSession;

    constructor(session: MergeSession) {
        this.session = session;
    }

    setupTools(server: Server): void {
        server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: [
                {
                    name: 'listConfigModels',
                    description: 'List the mission config files the merger understands and how each is merged',
                    inputSchema: {
                        type: 'object',
                        properties: {}
                    }
                },
                {
                    name: 'scanMods',
                    description: 'Scan mod folders for mergeable config files',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            skipMods: { type: 'array', items: { type: 'string' }, description: 'Mod folder names to leave out' },
                            includeUnknownSchema: { type: 'boolean', description: 'Route unknown-schema files to the copy list' }
                        }
                    }
                },
                {
                    name: 'previewMerge',
                    description: 'Compute new entries, duplicates and conflicts without writing anything',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            modIds: { type: 'array', items: { type: 'string' }, description: 'Only these mods' },
                            files: { type: 'array', items: { type: 'string' }, description: 'Only these source files' },
                            targetOverrides: {
                                type: 'object',
                                additionalProperties: { type: 'string' },
                                description: 'Source file -> mission filename'
                            }
                        }
                    }
                },
                {
                    name: 'getConflicts',
                    description: 'List conflict groups of the current preview',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            targetFilename: { type: 'string', description: 'Filter by mission file' },
                            unresolvedOnly: { type: 'boolean', description: 'Hide groups that already have a resolution' }
                        }
                    }
                },
                {
                    name: 'showEntry',
                    description: 'Show the XML of one entry of the current preview',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            targetFilename: { type: 'string', description: 'Mission file' },
                            entryId: { type: 'string', description: 'Entry id from getConflicts' }
                        },
                        required: ['targetFilename', 'entryId']
                    }
                },
                {
                    name: 'resolveConflict',
                    description: 'Choose the entries that win a conflict group',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            targetFilename: { type: 'string', description: 'Mission file' },
                            coarseKey: { type: 'string', description: 'Conflict group key' },
                            entryIds: { type: 'array', items: { type: 'string' }, description: 'Selected entries' },
                            mode: { type: 'string', enum: ['replace', 'merge', 'keep_all'], description: 'Resolution mode (default: replace)' }
                        },
                        required: ['targetFilename', 'coarseKey', 'entryIds']
                    }
                },
                {
                    name: 'clearResolution',
                    description: 'Drop a resolution, or all of them when no key is given',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            targetFilename: { type: 'string', description: 'Mission file' },
                            coarseKey: { type: 'string', description: 'Conflict group key' }
                        }
                    }
                },
                {
                    name: 'autoResolve',
                    description: 'Resolve every open conflict with a policy',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            policy: { type: 'string', enum: ['identical', 'first', 'last', 'mod_priority'], description: 'Resolution policy' },
                            modPriority: { type: 'array', items: { type: 'string' }, description: 'Mod ids, highest priority first' }
                        },
                        required: ['policy']
                    }
                },
                {
                    name: 'executeMerge',
                    description: 'Write the current preview into the mission files',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            includeUnresolvedConflicts: { type: 'boolean', description: 'Forced mode: write a pick for open conflicts' },
                            forcedPick: { type: 'string', enum: ['first', 'last', 'mod_priority'], description: 'Pick policy in forced mode' },
                            modPriority: { type: 'array', items: { type: 'string' }, description: 'Mod ids, highest priority first' },
                            confirmOverwrite: { type: 'boolean', description: 'Allow rewriting existing mission files' }
                        }
                    }
                },
                {
                    name: 'findDuplicates',
                    description: 'Find entries repeated inside one mission file',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            filename: { type: 'string', description: 'Mission file, e.g. types.xml' }
                        },
                        required: ['filename']
                    }
                },
                {
                    name: 'fixDuplicates',
                    description: 'Collapse identical duplicates and apply resolutions for divergent ones',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            filename: { type: 'string', description: 'Mission file, e.g. types.xml' },
                            resolutions: {
                                type: 'array',
                                items: {
                                    type: 'object',
                                    properties: {
                                        coarseKey: { type: 'string' },
                                        mode: { type: 'string', enum: ['replace', 'merge', 'keep_all'] },
                                        entryIds: { type: 'array', items: { type: 'string' } }
                                    },
                                    required: ['coarseKey', 'mode', 'entryIds']
                                },
                                description: 'Choices for divergent groups'
                            },
                            policy: { type: 'string', enum: ['first', 'last', 'mod_priority'], description: 'Pick for groups without a choice' }
                        },
                        required: ['filename']
                    }
                },
                {
                    name: 'getStatistics',
                    description: 'Get session statistics',
                    inputSchema: {
                        type: 'object',
                        properties: {}
                    }
                }
            ]
        }));

        server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;

            try {
                const result = await this.callTool(name, args ?? {});
                return {
                    content: [{
                        type: 'text',
                        text: JSON.stringify(result, null, 2)
                    }]
                };
            } catch (error) {
                return {
                    content: [{
                        type: 'text',
                        text: `Error: ${error instanceof z.ZodError ? formatZodError(error) : describeError(error)}`
                    }],
                    isError: true
                };
            }
        });
    }

    async callTool(name: string, args: unknown): Promise<unknown> {
        switch (name) {
            case 'listConfigModels':
                return this.handleListConfigModels();
            case 'scanMods':
                return this.handleScanMods(scanArgs.parse(args));
            case 'previewMerge':
                return this.handlePreviewMerge(previewArgs.parse(args));
            case 'getConflicts':
                return this.handleGetConflicts(conflictsArgs.parse(args));
            case 'showEntry':
                return this.handleShowEntry(showEntryArgs.parse(args));
            case 'resolveConflict':
                return this.handleResolveConflict(resolveArgs.parse(args));
            case 'clearResolution':
                return this.handleClearResolution(clearArgs.parse(args));
            case 'autoResolve':
                return this.handleAutoResolve(autoResolveArgs.parse(args));
            case 'executeMerge':
                return this.handleExecuteMerge(executeArgs.parse(args));
            case 'findDuplicates':
                return this.handleFindDuplicates(duplicatesArgs.parse(args));
            case 'fixDuplicates':
                return this.handleFixDuplicates(fixDuplicatesArgs.parse(args));
            case 'getStatistics':
                return this.session.statistics();
            default:
                throw new Error(`Unknown tool: ${name}`);
        }
    }

    private handleListConfigModels() {
        return this.session.registry.list().map(model => ({
            id: model.id,
            filename: model.filename,
            rootTag: model.rootTag,
            entryTag: model.entryTag,
            identityAttribute: model.identityAttribute,
            mergeStrategy: model.mergeStrategy,
            mergeableChildFields: model.mergeableChildFields,
            description: model.description
        }));
    }

    private async handleScanMods(params: z.infer<typeof scanArgs>) {
        const report = await this.session.scan(params);
        return {
            filesScanned: report.filesScanned,
            cancelled: report.cancelled,
            mods: report.mods.map(mod => ({
                modId: mod.modId,
                displayName: mod.displayName,
                entriesCount: mod.entriesCount,
                needsManualReview: mod.needsManualReview,
                manualReviewReason: mod.manualReviewReason || undefined,
                mapSpecificFiles: mod.mapSpecificFiles,
                files: mod.configFiles.map(file => ({
                    file: file.relativePath,
                    classification: file.classification,
                    model: file.modelId,
                    target: file.targetFilename,
                    entries: file.entryCount,
                    warnings: file.warnings,
                    reason: file.reason
                }))
            }))
        };
    }

    private async handlePreviewMerge(params: z.infer<typeof previewArgs>) {
        const preview = await this.session.buildPreview(params);
        return {
            targets: [...preview.results.values()].map(result => ({
                targetFilename: result.targetFilename,
                model: result.model.id,
                counts: result.counts,
                newEntries: result.newEntries.map(entry => entry.coarseKey),
                duplicates: result.duplicateGroups.map(group => group.coarseKey),
                conflicts: result.conflictGroups.map(group => group.coarseKey),
                skipped: result.skippedGroups.map(group => group.coarseKey)
            })),
            copyOnly: preview.copyOnly,
            warnings: preview.warnings,
            modsNeedingManualReview: preview.modsNeedingManualReview
        };
    }

    private handleGetConflicts(params: z.infer<typeof conflictsArgs>) {
        const preview = this.session.requirePreview();
        const resolver = this.session.requireResolver();

        const conflicts = [];
        for (const result of preview.results.values()) {
            if (params.targetFilename && result.targetFilename !== params.targetFilename) continue;
            for (const group of result.conflictGroups) {
                const resolution = resolver.resolution(result.targetFilename, group.coarseKey);
                if (params.unresolvedOnly && resolution) continue;
                conflicts.push({
                    targetFilename: result.targetFilename,
                    coarseKey: group.coarseKey,
                    strategy: result.model.mergeStrategy,
                    candidates: group.candidates.map(entry => this.summarizeEntry(entry)),
                    resolution: resolution ? resolver.describe(resolution) : null
                });
            }
        }
        return { count: conflicts.length, conflicts };
    }

    private handleShowEntry(params: z.infer<typeof showEntryArgs>) {
        const preview = this.session.requirePreview();
        const result = preview.results.get(params.targetFilename);
        if (!result) {
            return { error: `No merge result for '${params.targetFilename}'` };
        }

        const entry = this.entriesOf(result).find(candidate => candidate.id === params.entryId);
        if (!entry) {
            return { error: `Entry '${params.entryId}' not found in ${params.targetFilename}` };
        }
        return { ...this.summarizeEntry(entry), xml: serializeNode(entry.element) };
    }

    private handleResolveConflict(params: z.infer<typeof resolveArgs>) {
        const resolver = this.session.requireResolver();
        const resolution = resolver.selectByIds(params.targetFilename, params.coarseKey, params.entryIds, params.mode);
        return {
            resolved: resolver.describe(resolution),
            mode: resolution.mode,
            remaining: Object.values(resolver.unresolved()).flat().length
        };
    }

    private handleClearResolution(params: z.infer<typeof clearArgs>) {
        const resolver = this.session.requireResolver();
        if (params.targetFilename && params.coarseKey) {
            return { cleared: resolver.clear(params.targetFilename, params.coarseKey) ? 1 : 0 };
        }
        return { cleared: resolver.clearAll() };
    }

    private handleAutoResolve(params: z.infer<typeof autoResolveArgs>) {
        const resolver = this.session.requireResolver();
        const resolved = this.applyPolicy(params.policy, params.modPriority ?? []);
        return { resolved, unresolved: resolver.unresolved() };
    }

    private applyPolicy(policy: z.infer<typeof autoResolveArgs>['policy'], modPriority: string[]): number {
        const resolver = this.session.requireResolver();
        switch (policy) {
            case 'identical':
                return resolver.autoResolveIdentical();
            case 'first':
                return resolver.autoResolveFirstEntry();
            case 'last':
                return resolver.autoResolveLastEntry();
            case 'mod_priority':
                return resolver.autoResolveByModPriority(modPriority);
        }
    }

    private async handleExecuteMerge(params: z.infer<typeof executeArgs>) {
        return this.session.execute(params);
    }

    private async handleFindDuplicates(params: z.infer<typeof duplicatesArgs>) {
        const groups = await this.session.findDuplicates(params.filename);
        return {
            filename: params.filename,
            count: groups.length,
            groups: groups.map(group => ({
                coarseKey: group.coarseKey,
                identical: group.identical,
                entries: group.entries.map(entry => ({ id: entry.id, xml: serializeNode(entry.element) }))
            }))
        };
    }

    private async handleFixDuplicates(params: z.infer<typeof fixDuplicatesArgs>) {
        const resolutions = new Map<string, DuplicateResolution>(
            (params.resolutions ?? []).map(item => [item.coarseKey, { mode: item.mode, entryIds: item.entryIds }])
        );
        const report = await this.session.fixDuplicates(params.filename, resolutions, params.policy);
        return {
            path: report.path,
            status: report.status,
            collapsed: report.collapsed,
            resolved: report.resolved,
            remaining: report.remaining.map(group => group.coarseKey),
            error: report.error
        };
    }

    private entriesOf(result: MergeResult): ConfigEntry[] {
        const grouped = (groups: ConflictGroup[]) => groups.flatMap(group => group.candidates);
        return [
            ...result.newEntries,
            ...result.duplicateGroups.flatMap(group => group.members),
            ...grouped(result.conflictGroups),
            ...grouped(result.skippedGroups)
        ];
    }

    private summarizeEntry(entry: ConfigEntry) {
        return {
            id: entry.id,
            source: this.session.displayName(entry.sourceMod),
            sourceFile: entry.sourceFile,
            status: entry.status
        };
    }
}
