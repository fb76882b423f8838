import { isAbsolute, join, resolve } from 'path';
import { AppConfig } from './config.js';
import { ConflictResolver } from './ConflictResolver.js';
import { DuplicateFixer, DuplicateResolution } from './DuplicateFixer.js';
import { OverwriteNotConfirmedError } from './errors.js';
import { pathExists } from './fileSystem.js';
import { Logger } from './logger.js';
import { MergeExecutor, pendingTargets } from './MergeExecutor.js';
import { MergePreviewEngine, TARGET_SOURCE } from './MergePreviewEngine.js';
import { DiscoveredMod, displayNameMap, ModLoader } from './ModLoader.js';
import { ModScanner } from './ModScanner.js';
import { SchemaRegistry, schemaRegistry } from './SchemaRegistry.js';
import {
    DuplicateFixReport,
    DuplicateGroup,
    ForcedPickPolicy,
    MergePreview,
    MergeReport,
    ScanReport
} from './types.js';

export type SessionConfig = Pick<AppConfig,
    'missionPath' | 'modDirs' | 'serverPath' | 'skipMods' | 'currentMap' |
    'includeUnknownSchema' | 'annotate' | 'forcedPick' | 'modBatchSize'>;

export interface PreviewRequest {
    modIds?: string[];
    // Absolute, or relative to the mod folder they belong to.
    files?: string[];
    targetOverrides?: Record<string, string>;
}

export interface ExecuteRequest {
    includeUnresolvedConflicts?: boolean;
    forcedPick?: ForcedPickPolicy;
    modPriority?: string[];
    confirmOverwrite?: boolean;
}

/** Latest scan, preview and resolver of one operator, between tool calls. */
export class MergeSession {
    readonly config: SessionConfig;
    readonly registry: SchemaRegistry;
    private loader: ModLoader;
    private scanner = new ModScanner();
    private engine = new MergePreviewEngine();
    private executor = new MergeExecutor();
    private fixer = new DuplicateFixer();
    private logger = new Logger('session');

    private mods: DiscoveredMod[] = [];
    private displayNames: ReadonlyMap<string, string> = new Map();
    private scanReport: ScanReport | null = null;
    private preview: MergePreview | null = null;
    private resolver: ConflictResolver | null = null;
    private lastReport: MergeReport | null = null;

    constructor(config: SessionConfig, registry: SchemaRegistry = schemaRegistry) {
        this.config = config;
        this.registry = registry;
        this.loader = new ModLoader(config.serverPath, config.modDirs, config.modBatchSize);
    }

    async scan(options: { skipMods?: string[]; includeUnknownSchema?: boolean } = {}): Promise<ScanReport> {
        this.mods = await this.loader.loadMods();
        this.displayNames = displayNameMap(this.mods);

        this.scanReport = await this.scanner.scan(this.mods.map(mod => mod.path), {
            includeUnknownSchema: options.includeUnknownSchema ?? this.config.includeUnknownSchema,
            skip: new Set([...this.config.skipMods, ...(options.skipMods ?? [])]),
            displayNames: this.displayNames,
            currentMap: this.config.currentMap,
            onProgress: ({ current, total, file }) => this.logger.debug(`file ${current} of ${total}: ${file}`)
        });
        this.preview = null;
        this.resolver = null;
        return this.scanReport;
    }

    async buildPreview(request: PreviewRequest = {}): Promise<MergePreview> {
        const scan = this.scanReport ?? await this.scan();
        const wanted = request.modIds ? new Set(request.modIds) : null;
        const mods = scan.mods.filter(mod => !wanted || wanted.has(mod.modId));

        let selectedFiles: Set<string> | undefined;
        if (request.files) {
            selectedFiles = new Set();
            for (const file of request.files) {
                if (isAbsolute(file)) {
                    selectedFiles.add(resolve(file));
                    continue;
                }
                for (const mod of mods) {
                    const match = mod.configFiles.find(info => info.relativePath === file);
                    if (match) selectedFiles.add(match.path);
                }
            }
        }

        const targetOverrides = new Map<string, string>();
        for (const [source, target] of Object.entries(request.targetOverrides ?? {})) {
            const match = mods.flatMap(mod => mod.configFiles).find(info => info.path === source || info.relativePath === source);
            targetOverrides.set(match?.path ?? source, target);
        }

        this.preview = await this.engine.buildPreview(this.config.missionPath, mods, {
            selectedFiles,
            targetOverrides,
            includeUnknownSchema: this.config.includeUnknownSchema
        });
        this.resolver = new ConflictResolver(this.preview, this.displayNames);
        return this.preview;
    }

    requirePreview(): MergePreview {
        if (!this.preview) {
            throw new Error('No merge preview; run previewMerge first');
        }
        return this.preview;
    }

    requireResolver(): ConflictResolver {
        if (!this.resolver) {
            throw new Error('No merge preview; run previewMerge first');
        }
        return this.resolver;
    }

    async execute(request: ExecuteRequest = {}): Promise<MergeReport> {
        const preview = this.requirePreview();

        if (!request.confirmOverwrite) {
            const existing: string[] = [];
            for (const filename of pendingTargets(preview, this.config.includeUnknownSchema)) {
                if (await pathExists(join(this.config.missionPath, filename))) existing.push(filename);
            }
            if (existing.length > 0) {
                throw new OverwriteNotConfirmedError(existing);
            }
        }

        const report = await this.executor.execute(preview, {
            includeUnresolvedConflicts: request.includeUnresolvedConflicts,
            forcedPick: request.forcedPick ?? this.config.forcedPick,
            modPriority: request.modPriority,
            annotate: this.config.annotate,
            copyUnknownFiles: this.config.includeUnknownSchema
        });
        this.preview = null;
        this.resolver = null;
        this.lastReport = report;
        return report;
    }

    async findDuplicates(filename: string): Promise<DuplicateGroup[]> {
        const model = this.modelFor(filename);
        const { groups } = await this.fixer.inspect(join(this.config.missionPath, filename), model);
        return groups;
    }

    async fixDuplicates(
        filename: string,
        resolutions: ReadonlyMap<string, DuplicateResolution> = new Map(),
        policy?: ForcedPickPolicy
    ): Promise<DuplicateFixReport> {
        return this.fixer.fixDuplicates(join(this.config.missionPath, filename), {
            resolutions,
            policy,
            model: this.modelFor(filename)
        });
    }

    displayName(modId: string): string {
        if (modId === TARGET_SOURCE) return 'mission file';
        return this.displayNames.get(modId) ?? modId;
    }

    statistics() {
        const preview = this.preview;
        const results = preview ? [...preview.results.values()] : [];
        return {
            missionPath: this.config.missionPath,
            modsDiscovered: this.mods.length,
            modsWithConfigs: this.scanReport?.mods.length ?? 0,
            filesScanned: this.scanReport?.filesScanned ?? 0,
            modsNeedingManualReview: this.scanReport?.mods.filter(mod => mod.needsManualReview).map(mod => mod.modId) ?? [],
            preview: preview
                ? {
                    targets: results.length,
                    newEntries: results.reduce((sum, result) => sum + result.counts.new, 0),
                    duplicateGroups: results.reduce((sum, result) => sum + result.counts.duplicate, 0),
                    conflictGroups: results.reduce((sum, result) => sum + result.counts.conflict, 0),
                    skippedGroups: results.reduce((sum, result) => sum + result.counts.skipped, 0),
                    unresolved: this.resolver ? Object.values(this.resolver.unresolved()).flat().length : 0,
                    copyOnly: preview.copyOnly.length,
                    schemaWarnings: preview.warnings.length
                }
                : null,
            lastMerge: this.lastReport
                ? {
                    written: this.lastReport.files.filter(file => file.status === 'written').length,
                    failed: this.lastReport.files.filter(file => file.status === 'failed').length,
                    copied: this.lastReport.copied.filter(copy => copy.status === 'written').length,
                    cancelled: this.lastReport.cancelled
                }
                : null
        };
    }

    private modelFor(filename: string) {
        return this.registry.modelForFilename(filename) ?? this.registry.modelForFilenamePattern(filename) ?? undefined;
    }
}
