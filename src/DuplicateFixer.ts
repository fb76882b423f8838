import { basename } from 'path';
import { describeError } from './errors.js';
import { pickCandidate, resolutionElements, validateSelection } from './ConflictResolver.js';
import { collectEntries, FragmentParser, fragmentParser } from './FragmentParser.js';
import { writeFileAtomic } from './fileSystem.js';
import { Logger } from './logger.js';
import { spliceEntries } from './MergeExecutor.js';
import { TARGET_SOURCE } from './MergePreviewEngine.js';
import { buildDocument, cloneElement } from './XmlTree.js';
import {
    ConfigEntry,
    ConfigModel,
    DuplicateFixReport,
    DuplicateGroup,
    ForcedPickPolicy,
    ParsedDocument,
    ResolutionMode,
    XmlNode
} from './types.js';

export interface DuplicateResolution {
    mode: ResolutionMode;
    entryIds: string[];
}

export interface FixOptions {
    // Coarse key -> chosen entries of a divergent group.
    resolutions?: ReadonlyMap<string, DuplicateResolution>;
    // Applied to divergent groups without an explicit resolution.
    policy?: ForcedPickPolicy;
    model?: ConfigModel;
}

/**
 * Entries of one document that share a coarse key. Positional models key on
 * name plus placement, so repeated placements of one group are not reported.
 */
export function findDuplicateGroups(document: ParsedDocument, model: ConfigModel): DuplicateGroup[] {
    const entries = collectEntries({ ...document, model }, TARGET_SOURCE, basename(document.path));
    const byKey = new Map<string, ConfigEntry[]>();
    for (const entry of entries) {
        const group = byKey.get(entry.coarseKey) ?? [];
        group.push(entry);
        byKey.set(entry.coarseKey, group);
    }

    const groups: DuplicateGroup[] = [];
    for (const [coarseKey, members] of byKey) {
        if (members.length < 2) continue;
        const signatures = new Set(members.map(member => member.deepSignature));
        groups.push({ coarseKey, entries: members, identical: signatures.size === 1 });
    }
    return groups;
}

export class DuplicateFixer {
    private parser: FragmentParser;
    private logger = new Logger('duplicates');

    constructor(parser: FragmentParser = fragmentParser) {
        this.parser = parser;
    }

    async inspect(path: string, model?: ConfigModel): Promise<{ model: ConfigModel; groups: DuplicateGroup[] }> {
        const { document } = await this.parser.parse(path, { model, unwrapCommentedEntries: false });
        const resolved = model ?? document.model;
        if (!resolved) {
            throw new Error(`${path}: unknown config schema <${document.root.tag}>`);
        }
        return { model: resolved, groups: findDuplicateGroups(document, resolved) };
    }

    /**
     * Collapses identical groups and applies the given resolutions, then writes
     * the file atomically. Groups left without a decision are reported back.
     */
    async fixDuplicates(path: string, options: FixOptions = {}): Promise<DuplicateFixReport> {
        const report: DuplicateFixReport = { path, status: 'unchanged', collapsed: 0, resolved: 0, remaining: [] };

        try {
            const { document } = await this.parser.parse(path, { model: options.model, unwrapCommentedEntries: false });
            const model = options.model ?? document.model;
            if (!model) {
                throw new Error(`unknown config schema <${document.root.tag}>`);
            }

            const replacements = new Map<string, XmlNode[]>();
            for (const group of findDuplicateGroups(document, model)) {
                if (group.identical) {
                    replacements.set(group.coarseKey, [cloneElement(group.entries[0].element)]);
                    report.collapsed++;
                    continue;
                }

                const requested = options.resolutions?.get(group.coarseKey);
                if (requested) {
                    const selected = requested.entryIds.map(id => group.entries.find(entry => entry.id === id));
                    const entries = selected.filter((entry): entry is ConfigEntry => entry !== undefined);
                    if (entries.length !== selected.length) {
                        throw new Error(`${group.coarseKey}: unknown entry id in resolution`);
                    }
                    const resolution = validateSelection(model, group.coarseKey, group.entries, entries, requested.mode);
                    replacements.set(group.coarseKey, resolutionElements(model, resolution));
                    report.resolved++;
                } else if (options.policy) {
                    replacements.set(group.coarseKey, [cloneElement(pickCandidate(group.entries, options.policy).element)]);
                    report.resolved++;
                } else {
                    report.remaining.push(group);
                }
            }

            if (replacements.size === 0) return report;

            spliceEntries(document.root, model, replacements);
            await writeFileAtomic(path, buildDocument(document.root));
            report.status = 'written';
            this.logger.info(`${basename(path)}: ${report.collapsed} collapsed, ${report.resolved} resolved, ${report.remaining.length} left`);
        } catch (error) {
            report.status = 'failed';
            report.error = describeError(error);
            this.logger.error(`Failed to fix duplicates in ${path}: ${report.error}`);
        }
        return report;
    }
}
