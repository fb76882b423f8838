import { join } from 'path';
import { PreviewConsumedError, UnresolvedConflictError, describeError } from './errors.js';
import { pickCandidate, resolutionElements, unresolvedConflicts } from './ConflictResolver.js';
import { FragmentParser, fragmentParser } from './FragmentParser.js';
import { copyFileAtomic, pathExists, writeFileAtomic } from './fileSystem.js';
import { Logger } from './logger.js';
import { TARGET_SOURCE } from './MergePreviewEngine.js';
import { coarseKey } from './Signature.js';
import { buildDocument, cloneElement, createComment, createElement } from './XmlTree.js';
import {
    ConfigModel,
    CopyReport,
    FileMergeReport,
    ForcedPickPolicy,
    MergePreview,
    MergeReport,
    MergeResult,
    XmlElement,
    XmlNode
} from './types.js';

export interface ExecuteProgress {
    current: number;
    total: number;
    file: string;
}

export interface ExecuteOptions {
    // Escape valve: write a forced pick for every conflict still unresolved.
    includeUnresolvedConflicts?: boolean;
    forcedPick?: ForcedPickPolicy;
    modPriority?: readonly string[];
    annotate?: boolean;
    copyUnknownFiles?: boolean;
    onProgress?: (progress: ExecuteProgress) => void;
    signal?: AbortSignal;
}

const ANNOTATION_PATTERN = /^(?:Added|Resolved \(replace\)|Merged|Kept|Forced) from /;

function isAnnotation(node: XmlNode | undefined): boolean {
    return node?.type === 'comment' && ANNOTATION_PATTERN.test(node.text.trim());
}

/**
 * Replaces every root child whose coarse key has an entry in `replacements`.
 * The replacement nodes land where the first superseded element stood, or at
 * the end when the root had none. A source annotation directly above a
 * superseded element goes with it. Returns the number of elements removed.
 */
export function spliceEntries(root: XmlElement, model: ConfigModel, replacements: ReadonlyMap<string, XmlNode[]>): number {
    const children: XmlNode[] = [];
    const placed = new Set<string>();
    let removed = 0;

    for (const child of root.children) {
        if (child.type === 'element') {
            const key = coarseKey(model, child);
            const nodes = replacements.get(key);
            if (nodes) {
                removed++;
                if (isAnnotation(children[children.length - 1])) children.pop();
                if (!placed.has(key)) {
                    children.push(...nodes);
                    placed.add(key);
                }
                continue;
            }
        }
        children.push(child);
    }

    for (const [key, nodes] of replacements) {
        if (!placed.has(key)) children.push(...nodes);
    }

    root.children = children;
    return removed;
}

/**
 * Target filenames the executor would rewrite for this preview, including
 * the destinations of copy-only files when those are copied.
 */
export function pendingTargets(preview: MergePreview, includeCopies: boolean = false): string[] {
    const merged = [...preview.results.values()]
        .filter(result => {
            const resolutions = preview.resolvedConflicts.get(result.targetFilename);
            return result.newEntries.length > 0
                || result.conflictGroups.length > 0
                || result.duplicateGroups.some(group => !group.presentInTarget)
                || result.skippedGroups.some(group => resolutions?.has(group.coarseKey));
        })
        .map(result => result.targetFilename);
    const copied = includeCopies ? preview.copyOnly.map(copy => copy.targetFilename) : [];
    return [...new Set([...merged, ...copied])];
}

export class MergeExecutor {
    private parser: FragmentParser;
    private logger = new Logger('executor');

    constructor(parser: FragmentParser = fragmentParser) {
        this.parser = parser;
    }

    /**
     * Writes every target of the preview. Throws before touching any file when
     * conflicts are unresolved and forced mode is off. Each file is written
     * atomically and independently; failures are reported per file.
     */
    async execute(preview: MergePreview, options: ExecuteOptions = {}): Promise<MergeReport> {
        if (preview.consumed) {
            throw new PreviewConsumedError();
        }

        const unresolved = unresolvedConflicts(preview);
        if (Object.keys(unresolved).length > 0 && !options.includeUnresolvedConflicts) {
            throw new UnresolvedConflictError(unresolved);
        }
        preview.consumed = true;

        const displayNames = new Map(preview.mods.map(mod => [mod.modId, mod.displayName]));
        const copies = options.copyUnknownFiles === false ? [] : preview.copyOnly;
        const total = preview.results.size + copies.length;
        const report: MergeReport = { files: [], copied: [], cancelled: false };
        let current = 0;

        for (const result of preview.results.values()) {
            const path = join(preview.missionPath, result.targetFilename);
            if (options.signal?.aborted) {
                report.cancelled = true;
                report.files.push({ targetFilename: result.targetFilename, path, status: 'cancelled', counts: this.emptyCounts() });
                continue;
            }

            options.onProgress?.({ current: ++current, total, file: result.targetFilename });
            report.files.push(await this.mergeTarget(preview, result, path, displayNames, options));
        }

        for (const copy of copies) {
            const targetPath = join(preview.missionPath, copy.targetFilename);
            const entry: CopyReport = { sourcePath: copy.sourcePath, targetPath, status: 'cancelled' };
            if (options.signal?.aborted) {
                report.cancelled = true;
                report.copied.push(entry);
                continue;
            }

            options.onProgress?.({ current: ++current, total, file: copy.targetFilename });
            try {
                await copyFileAtomic(copy.sourcePath, targetPath);
                entry.status = 'written';
            } catch (error) {
                entry.status = 'failed';
                entry.error = describeError(error);
                this.logger.error(`Failed to copy ${copy.sourcePath}: ${entry.error}`);
            }
            report.copied.push(entry);
        }

        const written = report.files.filter(file => file.status === 'written').length;
        const failed = report.files.filter(file => file.status === 'failed').length;
        this.logger.info(`Merge finished: ${written} written, ${failed} failed, ${report.copied.length} copied`);
        return report;
    }

    private async mergeTarget(
        preview: MergePreview,
        result: MergeResult,
        path: string,
        displayNames: ReadonlyMap<string, string>,
        options: ExecuteOptions
    ): Promise<FileMergeReport> {
        const model = result.model;
        const counts = this.emptyCounts();
        counts.duplicate = result.counts.duplicate;
        counts.conflict = result.counts.conflict;

        const annotate = options.annotate ?? true;
        const nameOf = (modId: string) => displayNames.get(modId) ?? modId;
        const withNote = (note: string, elements: XmlElement[], sourceMods: string[]): XmlNode[] => {
            const fromMods = sourceMods.filter(mod => mod !== TARGET_SOURCE);
            if (!annotate || fromMods.length === 0) return elements;
            return [createComment(`${note} from ${[...new Set(fromMods)].map(nameOf).join(', ')}`), ...elements];
        };

        const appended: XmlNode[] = [];
        const replacements = new Map<string, XmlNode[]>();

        for (const entry of result.newEntries) {
            appended.push(...withNote('Added', [cloneElement(entry.element)], [entry.sourceMod]));
            counts.new++;
        }

        for (const group of result.duplicateGroups) {
            if (group.presentInTarget) continue;
            const representative = group.representative;
            appended.push(...withNote('Added', [cloneElement(representative.element)], [representative.sourceMod]));
        }

        const resolutions = preview.resolvedConflicts.get(result.targetFilename);
        for (const group of [...result.conflictGroups, ...result.skippedGroups]) {
            const resolution = resolutions?.get(group.coarseKey);
            if (resolution) {
                const elements = resolutionElements(model, resolution);
                const note = resolution.mode === 'replace' ? 'Resolved (replace)' : resolution.mode === 'merge' ? 'Merged' : 'Kept';
                replacements.set(group.coarseKey, withNote(note, elements, resolution.entries.map(entry => entry.sourceMod)));
                if (resolution.mode !== 'replace') counts.merged++;
                continue;
            }

            // Skipped groups keep the mission's version unless resolved explicitly.
            if (!result.conflictGroups.includes(group) || !options.includeUnresolvedConflicts) continue;
            const pick = pickCandidate(group.candidates, options.forcedPick ?? 'first', options.modPriority);
            replacements.set(group.coarseKey, withNote('Forced', [cloneElement(pick.element)], [pick.sourceMod]));
            counts.forced++;
        }

        if (appended.length === 0 && replacements.size === 0) {
            return { targetFilename: result.targetFilename, path, status: 'unchanged', counts };
        }

        try {
            const root = await pathExists(path)
                ? (await this.parser.parse(path, { model, unwrapCommentedEntries: false })).document.root
                : createElement(model.rootTag);

            counts.removed = spliceEntries(root, model, replacements);
            root.children.push(...appended);

            await writeFileAtomic(path, buildDocument(root));
            this.logger.debug(`Wrote ${path}`);
            return { targetFilename: result.targetFilename, path, status: 'written', counts };
        } catch (error) {
            const message = describeError(error);
            this.logger.error(`Failed to write ${path}: ${message}`);
            return { targetFilename: result.targetFilename, path, status: 'failed', counts, error: message };
        }
    }

    private emptyCounts(): FileMergeReport['counts'] {
        return { new: 0, duplicate: 0, conflict: 0, merged: 0, forced: 0, removed: 0 };
    }
}
