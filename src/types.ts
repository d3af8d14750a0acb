/** Relative file path (platform separator) -> summary, in insertion order. */
export type SummaryMap = Map<string, string>;

/** A summary (file) or a nested directory. */
export type SummaryNode = string | SummaryTree;

export type SummaryTree = Map<string, SummaryNode>;

export interface RenderLine {
    /** Indentation plus vertical continuation markers. */
    prefix: string;
    connector: string;
    name: string;
    kind: 'file' | 'directory';
    /** Flattened to one line; only for files. */
    summary?: string;
}

export type SkipReason = 'read-error' | 'empty' | 'summary-failed';

export interface SkippedFile {
    path: string;
    reason: SkipReason;
}

export interface SummarizeRunResult {
    summaries: SummaryMap;
    skipped: SkippedFile[];
}
