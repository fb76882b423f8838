import { ResolutionError } from './errors.js';
import { TARGET_SOURCE } from './MergePreviewEngine.js';
import { permitsMultiSelection } from './SchemaRegistry.js';
import { childSignature } from './Signature.js';
import { childElements, cloneElement, createElement } from './XmlTree.js';
import {
    ConfigEntry,
    ConfigModel,
    ConflictGroup,
    EntryStatus,
    ForcedPickPolicy,
    MergePreview,
    MergeResult,
    Resolution,
    ResolutionMode,
    XmlElement
} from './types.js';

/**
 * Checks a selection against its group and the model's strategy and returns
 * the normalised resolution. One selected entry is always a replace.
 */
export function validateSelection(
    model: ConfigModel,
    coarseKey: string,
    candidates: readonly ConfigEntry[],
    selected: readonly ConfigEntry[],
    mode: ResolutionMode
): Resolution {
    if (selected.length === 0) {
        throw new ResolutionError(coarseKey, 'select at least one entry');
    }

    const ids = new Set<string>();
    for (const entry of selected) {
        if (!candidates.some(candidate => candidate.id === entry.id)) {
            throw new ResolutionError(coarseKey, `entry ${entry.id} is not part of this group`);
        }
        if (ids.has(entry.id)) {
            throw new ResolutionError(coarseKey, `entry ${entry.id} selected twice`);
        }
        ids.add(entry.id);
    }

    if (selected.length === 1) {
        return { coarseKey, mode: 'replace', entries: [...selected] };
    }

    switch (mode) {
        case 'replace':
            throw new ResolutionError(coarseKey, `replace takes exactly one entry, got ${selected.length}`);
        case 'merge':
            if (!permitsMultiSelection(model.mergeStrategy)) {
                throw new ResolutionError(coarseKey, `${model.filename} does not allow merging entries (${model.mergeStrategy})`);
            }
            break;
        case 'keep_all':
            if (model.mergeStrategy !== 'append') {
                throw new ResolutionError(coarseKey, `${model.filename} does not allow keeping several entries (${model.mergeStrategy})`);
            }
            break;
        default: {
            const unreachable: never = mode;
            throw new ResolutionError(coarseKey, `unknown resolution mode ${String(unreachable)}`);
        }
    }
    return { coarseKey, mode, entries: [...selected] };
}

/**
 * Union of several versions of one entry. The first element's attributes and
 * text win; mergeable child fields are deduplicated by child signature, other
 * child tags come from the first element that has them.
 */
export function mergeEntryElements(model: ConfigModel, elements: readonly XmlElement[]): XmlElement {
    if (elements.length === 0) {
        throw new Error('Nothing to merge');
    }

    const [first] = elements;
    const merged = createElement(first.tag, first.attributes);
    merged.text = first.text;

    const mergeable = new Set(model.mergeableChildFields);
    const unionAll = mergeable.size === 0;
    const seen = new Set<string>();
    const exclusiveOwner = new Map<string, number>();

    elements.forEach((element, index) => {
        for (const child of childElements(element)) {
            if (unionAll || mergeable.has(child.tag)) {
                const signature = childSignature(child);
                if (seen.has(signature)) continue;
                seen.add(signature);
                merged.children.push(cloneElement(child));
                continue;
            }

            const owner = exclusiveOwner.get(child.tag) ?? index;
            if (owner !== index) continue;
            exclusiveOwner.set(child.tag, index);
            merged.children.push(cloneElement(child));
        }
    });

    return merged;
}

/** Elements a resolution writes, in order. */
export function resolutionElements(model: ConfigModel, resolution: Resolution): XmlElement[] {
    switch (resolution.mode) {
        case 'replace':
            return [cloneElement(resolution.entries[0].element)];
        case 'merge':
            return [mergeEntryElements(model, resolution.entries.map(entry => entry.element))];
        case 'keep_all':
            return resolution.entries.map(entry => cloneElement(entry.element));
        default: {
            const unreachable: never = resolution.mode;
            throw new Error(`Unknown resolution mode ${String(unreachable)}`);
        }
    }
}

/**
 * Forced pick over the mod candidates of a group; the target's own entries
 * are only chosen when no mod candidate is left.
 */
export function pickCandidate(
    candidates: readonly ConfigEntry[],
    policy: ForcedPickPolicy,
    modPriority: readonly string[] = []
): ConfigEntry {
    const fromMods = candidates.filter(candidate => candidate.sourceMod !== TARGET_SOURCE);
    const pool = fromMods.length > 0 ? fromMods : [...candidates];
    if (pool.length === 0) {
        throw new Error('Cannot pick from an empty group');
    }

    switch (policy) {
        case 'first':
            return pool[0];
        case 'last':
            return pool[pool.length - 1];
        case 'mod_priority': {
            const rank = (entry: ConfigEntry) => {
                const position = modPriority.indexOf(entry.sourceMod);
                return position === -1 ? modPriority.length : position;
            };
            return pool.reduce((best, entry) => (rank(entry) < rank(best) ? entry : best));
        }
        default: {
            const unreachable: never = policy;
            throw new Error(`Unknown pick policy ${String(unreachable)}`);
        }
    }
}

export class ConflictResolver {
    private preview: MergePreview;
    private displayNames: ReadonlyMap<string, string>;

    constructor(preview: MergePreview, displayNames: ReadonlyMap<string, string> = new Map()) {
        this.preview = preview;
        this.displayNames = displayNames;
    }

    select(targetFilename: string, coarseKey: string, entries: readonly ConfigEntry[], mode: ResolutionMode): Resolution {
        const { result, group } = this.requireGroup(targetFilename, coarseKey);
        const resolution = validateSelection(result.model, coarseKey, group.candidates, entries, mode);

        const selectedIds = new Set(resolution.entries.map(entry => entry.id));
        for (const candidate of group.candidates) {
            candidate.status = selectedIds.has(candidate.id) ? 'merged' : 'skipped';
        }
        this.resolutionsFor(targetFilename).set(coarseKey, resolution);
        return resolution;
    }

    /** Same as `select`, addressing entries by id. */
    selectByIds(targetFilename: string, coarseKey: string, entryIds: readonly string[], mode: ResolutionMode): Resolution {
        const { group } = this.requireGroup(targetFilename, coarseKey);
        const entries = entryIds.map(id => {
            const entry = group.candidates.find(candidate => candidate.id === id);
            if (!entry) throw new ResolutionError(coarseKey, `entry ${id} is not part of this group`);
            return entry;
        });
        return this.select(targetFilename, coarseKey, entries, mode);
    }

    clear(targetFilename: string, coarseKey: string): boolean {
        const resolutions = this.preview.resolvedConflicts.get(targetFilename);
        if (!resolutions?.delete(coarseKey)) return false;

        const found = this.findGroup(targetFilename, coarseKey);
        if (found) {
            for (const candidate of found.group.candidates) {
                candidate.status = found.baseStatus;
            }
        }
        return true;
    }

    clearAll(): number {
        let cleared = 0;
        for (const [targetFilename, resolutions] of this.preview.resolvedConflicts) {
            for (const coarseKey of [...resolutions.keys()]) {
                if (this.clear(targetFilename, coarseKey)) cleared++;
            }
        }
        return cleared;
    }

    /** Resolves conflict groups whose candidates turn out to be identical. */
    autoResolveIdentical(): number {
        let resolved = 0;
        for (const [targetFilename, result] of this.preview.results) {
            for (const group of result.conflictGroups) {
                if (this.isResolved(targetFilename, group.coarseKey)) continue;
                const signatures = new Set(group.candidates.map(candidate => candidate.deepSignature));
                if (signatures.size !== 1) continue;
                this.select(targetFilename, group.coarseKey, [group.candidates[0]], 'replace');
                resolved++;
            }
        }
        return resolved;
    }

    autoResolveFirstEntry(): number {
        return this.autoResolveWith('first');
    }

    autoResolveLastEntry(): number {
        return this.autoResolveWith('last');
    }

    autoResolveByModPriority(order: readonly string[]): number {
        return this.autoResolveWith('mod_priority', order);
    }

    isResolved(targetFilename: string, coarseKey: string): boolean {
        return this.preview.resolvedConflicts.get(targetFilename)?.has(coarseKey) ?? false;
    }

    resolution(targetFilename: string, coarseKey: string): Resolution | null {
        return this.preview.resolvedConflicts.get(targetFilename)?.get(coarseKey) ?? null;
    }

    /** Target filename -> coarse keys of conflict groups without a resolution. */
    unresolved(): Record<string, string[]> {
        return unresolvedConflicts(this.preview);
    }

    describe(resolution: Resolution): string {
        const sources = resolution.entries.map(entry => this.displayName(entry.sourceMod));
        switch (resolution.mode) {
            case 'replace':
                return `${resolution.coarseKey}: replace with ${sources[0]}`;
            case 'merge':
                return `${resolution.coarseKey}: merge ${sources.join(', ')}`;
            case 'keep_all':
                return `${resolution.coarseKey}: keep all from ${sources.join(', ')}`;
            default: {
                const unreachable: never = resolution.mode;
                return `${resolution.coarseKey}: ${String(unreachable)}`;
            }
        }
    }

    displayName(modId: string): string {
        if (modId === TARGET_SOURCE) return 'mission file';
        return this.displayNames.get(modId) ?? modId;
    }

    private autoResolveWith(policy: ForcedPickPolicy, order: readonly string[] = []): number {
        let resolved = 0;
        for (const [targetFilename, result] of this.preview.results) {
            for (const group of result.conflictGroups) {
                if (this.isResolved(targetFilename, group.coarseKey)) continue;
                this.select(targetFilename, group.coarseKey, [pickCandidate(group.candidates, policy, order)], 'replace');
                resolved++;
            }
        }
        return resolved;
    }

    private resolutionsFor(targetFilename: string): Map<string, Resolution> {
        let resolutions = this.preview.resolvedConflicts.get(targetFilename);
        if (!resolutions) {
            resolutions = new Map();
            this.preview.resolvedConflicts.set(targetFilename, resolutions);
        }
        return resolutions;
    }

    private findGroup(targetFilename: string, coarseKey: string):
        { result: MergeResult; group: ConflictGroup; baseStatus: EntryStatus } | null {
        const result = this.preview.results.get(targetFilename);
        if (!result) return null;

        const conflict = result.conflictGroups.find(group => group.coarseKey === coarseKey);
        if (conflict) return { result, group: conflict, baseStatus: 'conflict' };

        const skipped = result.skippedGroups.find(group => group.coarseKey === coarseKey);
        if (skipped) return { result, group: skipped, baseStatus: 'skipped' };
        return null;
    }

    private requireGroup(targetFilename: string, coarseKey: string): { result: MergeResult; group: ConflictGroup } {
        if (!this.preview.results.has(targetFilename)) {
            throw new ResolutionError(coarseKey, `no merge result for ${targetFilename}`);
        }
        const found = this.findGroup(targetFilename, coarseKey);
        if (!found) {
            throw new ResolutionError(coarseKey, `no conflict group in ${targetFilename}`);
        }
        return found;
    }
}

export function unresolvedConflicts(preview: MergePreview): Record<string, string[]> {
    const unresolved: Record<string, string[]> = {};
    for (const [targetFilename, result] of preview.results) {
        const resolutions = preview.resolvedConflicts.get(targetFilename);
        const keys = result.conflictGroups
            .map(group => group.coarseKey)
            .filter(key => !resolutions?.has(key));
        if (keys.length > 0) unresolved[targetFilename] = keys;
    }
    return unresolved;
}
