export interface XmlElement {
    type: 'element';
    tag: string;
    attributes: Record<string, string>;
    text: string;
    children: XmlNode[];
}

export interface XmlComment {
    type: 'comment';
    text: string;
}

export type XmlNode = XmlElement | XmlComment;

export type MergeStrategy = 'replace' | 'merge_children' | 'append' | 'skip';

export type EntryStatus = 'new' | 'duplicate' | 'conflict' | 'merged' | 'skipped' | 'manual';

export type ResolutionMode = 'replace' | 'merge' | 'keep_all';

export type ForcedPickPolicy = 'first' | 'last' | 'mod_priority';

export type ParseWarning =
    | 'byte_order_mark'
    | 'has_preamble'
    | 'has_postamble'
    | 'c_style_comments'
    | 'slash_comments'
    | 'malformed_comments'
    | 'interleaved_comments'
    | 'unwrap_comments'
    | 'wrapped_single_entry'
    | 'used_wrap_root'
    | 'used_extract_entries'
    | 'partial_extraction';

export interface ConfigModel {
    id: string;
    filename: string;
    rootTag: string;
    entryTag: string | null;
    identityAttribute: string | null;
    mergeStrategy: MergeStrategy;
    mergeableChildFields: readonly string[];
    // Entries repeat by design and differ only by placement; keys carry name + position.
    positional: boolean;
    // Numbered variants (mapgroupcluster03.xml) target a file of their own name.
    preserveFilename: boolean;
    filenamePatterns: readonly RegExp[];
    description: string;
}

export interface ParsedDocument {
    path: string;
    root: XmlElement;
    model: ConfigModel | null;
    warnings: ReadonlySet<ParseWarning>;
}

export interface ConfigEntry {
    readonly id: string;
    readonly element: XmlElement;
    readonly coarseKey: string;
    readonly deepSignature: string;
    readonly sourceMod: string;
    readonly sourceFile: string;
    status: EntryStatus;
}

export type FileClassification = 'mergeable' | 'empty' | 'copy_only' | 'invalid';

export interface ConfigFileInfo {
    path: string;
    relativePath: string;
    classification: FileClassification;
    modelId: string | null;
    targetFilename: string | null;
    entryCount: number;
    warnings: ParseWarning[];
    mapName: string | null;
    reason?: string;
}

export interface ModConfigInfo {
    modId: string;
    displayName: string;
    modPath: string;
    configFiles: ConfigFileInfo[];
    entriesCount: number;
    mapSpecificFiles: string[];
    needsManualReview: boolean;
    manualReviewReason: string;
}

export interface ScanProgress {
    current: number;
    total: number;
    modId: string;
    file: string;
}

export interface ScanReport {
    mods: ModConfigInfo[];
    filesScanned: number;
    cancelled: boolean;
}

export interface IdenticalGroup {
    coarseKey: string;
    representative: ConfigEntry;
    members: ConfigEntry[];
    presentInTarget: boolean;
}

export interface ConflictGroup {
    coarseKey: string;
    // Mod candidates in candidate order, then the target's own entries.
    candidates: ConfigEntry[];
}

export interface MergeCounts {
    total: number;
    new: number;
    duplicate: number;
    conflict: number;
    skipped: number;
}

export interface MergeResult {
    targetFilename: string;
    model: ConfigModel;
    newEntries: ConfigEntry[];
    duplicateGroups: IdenticalGroup[];
    conflictGroups: ConflictGroup[];
    skippedGroups: ConflictGroup[];
    counts: MergeCounts;
}

export interface Resolution {
    coarseKey: string;
    mode: ResolutionMode;
    entries: ConfigEntry[];
}

export interface CopyOnlyFile {
    sourcePath: string;
    sourceMod: string;
    targetFilename: string;
}

export interface SchemaMismatchWarning {
    kind: 'schema_mismatch';
    sourceFile: string;
    sourceMod: string;
    detectedModel: string;
    targetFilename: string;
    targetModel: string | null;
}

export interface MergePreview {
    missionPath: string;
    mods: ModConfigInfo[];
    results: Map<string, MergeResult>;
    copyOnly: CopyOnlyFile[];
    resolvedConflicts: Map<string, Map<string, Resolution>>;
    warnings: SchemaMismatchWarning[];
    modsNeedingManualReview: string[];
    consumed: boolean;
}

export type FileMergeStatus = 'written' | 'unchanged' | 'failed' | 'cancelled';

export interface FileMergeReport {
    targetFilename: string;
    path: string;
    status: FileMergeStatus;
    counts: {
        new: number;
        duplicate: number;
        conflict: number;
        merged: number;
        forced: number;
        removed: number;
    };
    error?: string;
}

export interface CopyReport {
    sourcePath: string;
    targetPath: string;
    status: FileMergeStatus;
    error?: string;
}

export interface MergeReport {
    files: FileMergeReport[];
    copied: CopyReport[];
    cancelled: boolean;
}

export interface DuplicateGroup {
    coarseKey: string;
    entries: ConfigEntry[];
    identical: boolean;
}

export interface DuplicateFixReport {
    path: string;
    status: FileMergeStatus;
    collapsed: number;
    resolved: number;
    remaining: DuplicateGroup[];
    error?: string;
}
