import { basename, join } from 'path';
import { describeError } from './errors.js';
import { collectEntries, FragmentParser, fragmentParser } from './FragmentParser.js';
import { pathExists } from './fileSystem.js';
import { Logger } from './logger.js';
import { SchemaRegistry, schemaRegistry } from './SchemaRegistry.js';
import {
    ConfigEntry,
    ConfigModel,
    ConflictGroup,
    CopyOnlyFile,
    EntryStatus,
    IdenticalGroup,
    MergePreview,
    MergeResult,
    ModConfigInfo,
    ParsedDocument,
    SchemaMismatchWarning
} from './types.js';

export interface PreviewOptions {
    // Absolute source paths; every mergeable file when omitted.
    selectedFiles?: ReadonlySet<string>;
    // Source path -> mission filename chosen by the operator.
    targetOverrides?: ReadonlyMap<string, string>;
    includeUnknownSchema?: boolean;
}

export const TARGET_SOURCE = 'target';

interface TargetBucket {
    model: ConfigModel;
    entries: ConfigEntry[];
}

function withStatus(entry: ConfigEntry, status: EntryStatus): ConfigEntry {
    return { ...entry, status };
}

export class MergePreviewEngine {
    private parser: FragmentParser;
    private registry: SchemaRegistry;
    private logger = new Logger('preview');

    constructor(parser: FragmentParser = fragmentParser, registry: SchemaRegistry = schemaRegistry) {
        this.parser = parser;
        this.registry = registry;
    }

    /**
     * Classifies candidates against one target document. Inputs are not mutated,
     * so the preview can be recomputed after every resolver edit.
     *
     * Entries already in the target join their coarse-key group with source
     * `target`. Candidate order only orders the output; it never picks a winner.
     */
    preview(target: ParsedDocument | null, candidates: ConfigEntry[], model: ConfigModel, targetFilename: string): MergeResult {
        const existing = new Map<string, ConfigEntry[]>();
        if (target) {
            for (const entry of collectEntries({ ...target, model }, TARGET_SOURCE, targetFilename)) {
                const bucket = existing.get(entry.coarseKey) ?? [];
                bucket.push(entry);
                existing.set(entry.coarseKey, bucket);
            }
        }

        const groups = new Map<string, ConfigEntry[]>();
        for (const candidate of candidates) {
            const group = groups.get(candidate.coarseKey) ?? [];
            group.push(candidate);
            groups.set(candidate.coarseKey, group);
        }

        const newEntries: ConfigEntry[] = [];
        const duplicateGroups: IdenticalGroup[] = [];
        const conflictGroups: ConflictGroup[] = [];
        const skippedGroups: ConflictGroup[] = [];

        for (const [key, members] of groups) {
            const inTarget = existing.get(key) ?? [];
            const signatures = new Set([...members, ...inTarget].map(entry => entry.deepSignature));

            if (inTarget.length === 0 && members.length === 1) {
                newEntries.push(withStatus(members[0], 'new'));
            } else if (signatures.size === 1) {
                const duplicates = members.map(member => withStatus(member, 'duplicate'));
                duplicateGroups.push({
                    coarseKey: key,
                    representative: duplicates[0],
                    members: duplicates,
                    presentInTarget: inTarget.length > 0
                });
            } else if (model.mergeStrategy === 'skip' && inTarget.length > 0) {
                // Server-wide variables already set in the mission win over mod defaults.
                skippedGroups.push({
                    coarseKey: key,
                    candidates: [...members, ...inTarget].map(entry => withStatus(entry, 'skipped'))
                });
            } else {
                conflictGroups.push({
                    coarseKey: key,
                    candidates: [...members, ...inTarget].map(entry => withStatus(entry, 'conflict'))
                });
            }
        }

        return {
            targetFilename,
            model,
            newEntries,
            duplicateGroups,
            conflictGroups,
            skippedGroups,
            counts: {
                total: candidates.length,
                new: newEntries.length,
                duplicate: duplicateGroups.length,
                conflict: conflictGroups.length,
                skipped: skippedGroups.length
            }
        };
    }

    async buildPreview(missionPath: string, mods: ModConfigInfo[], options: PreviewOptions = {}): Promise<MergePreview> {
        const buckets = new Map<string, TargetBucket>();
        const copyOnly: CopyOnlyFile[] = [];
        const warnings: SchemaMismatchWarning[] = [];

        for (const mod of mods) {
            for (const file of mod.configFiles) {
                if (options.selectedFiles && !options.selectedFiles.has(file.path)) continue;
                const override = options.targetOverrides?.get(file.path);

                if (file.classification === 'copy_only') {
                    if (options.includeUnknownSchema) {
                        copyOnly.push({
                            sourcePath: file.path,
                            sourceMod: mod.modId,
                            targetFilename: override ?? file.targetFilename ?? basename(file.path)
                        });
                    }
                    continue;
                }
                if (file.classification !== 'mergeable') continue;

                let document: ParsedDocument;
                try {
                    ({ document } = await this.parser.parse(file.path));
                } catch (error) {
                    this.logger.warn(`Skipping ${file.path}: ${describeError(error)}`);
                    continue;
                }
                const sourceModel = document.model;
                if (!sourceModel) continue;

                const targetFilename = override ?? this.registry.targetFilenameFor(basename(file.path), sourceModel);
                const targetModel = this.modelForTarget(targetFilename);
                if (override && targetModel?.id !== sourceModel.id) {
                    warnings.push({
                        kind: 'schema_mismatch',
                        sourceFile: file.relativePath,
                        sourceMod: mod.modId,
                        detectedModel: sourceModel.id,
                        targetFilename,
                        targetModel: targetModel?.id ?? null
                    });
                }

                let bucket = buckets.get(targetFilename);
                if (!bucket) {
                    bucket = { model: targetModel ?? sourceModel, entries: [] };
                    buckets.set(targetFilename, bucket);
                }
                bucket.entries.push(...collectEntries({ ...document, model: bucket.model }, mod.modId, file.relativePath));
            }
        }

        const results = new Map<string, MergeResult>();
        for (const [targetFilename, bucket] of buckets) {
            const target = await this.loadTarget(join(missionPath, targetFilename), bucket.model);
            const result = this.preview(target, bucket.entries, bucket.model, targetFilename);
            this.logger.debug(
                `${targetFilename}: ${result.counts.new} new, ${result.counts.duplicate} duplicate, ` +
                `${result.counts.conflict} conflict, ${result.counts.skipped} skipped`
            );
            results.set(targetFilename, result);
        }

        return {
            missionPath,
            mods,
            results,
            copyOnly,
            resolvedConflicts: new Map(),
            warnings,
            modsNeedingManualReview: mods.filter(mod => mod.needsManualReview).map(mod => mod.modId),
            consumed: false
        };
    }

    /** Mission files are read without reviving commented-out entries. */
    async loadTarget(path: string, model: ConfigModel): Promise<ParsedDocument | null> {
        if (!(await pathExists(path))) return null;
        const { document } = await this.parser.parse(path, { model, unwrapCommentedEntries: false });
        return document;
    }

    private modelForTarget(filename: string): ConfigModel | null {
        return this.registry.modelForFilename(filename) ?? this.registry.modelForFilenamePattern(filename);
    }
}
