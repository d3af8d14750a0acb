import type { RenderLine, SummaryTree } from '../types.js';

export const TREE_TITLE = 'Code Summary Tree';

export const CONNECTOR_LAST = '└── ';
export const CONNECTOR_MIDDLE = '├── ';
const INDENT_LAST = '    ';
const INDENT_MIDDLE = '│   ';
const SUMMARY_GAP = '    ';
const LINE_BREAK_SEPARATOR = ' | ';

/** Trims, then joins the summary's lines with ` | `. */
export function flattenSummary(summary: string): string {
    return summary.trim().replace(/\r\n|\r|\n/g, LINE_BREAK_SEPARATOR);
}

/**
 * Depth-first, in map iteration order. Pure: the same tree always yields the same lines.
 */
export function renderTree(tree: SummaryTree, prefix = ''): RenderLine[] {
    const lines: RenderLine[] = [];
    collectLines(tree, prefix, lines);
    return lines;
}

function collectLines(node: SummaryTree, prefix: string, lines: RenderLine[]): void {
    const entries = [...node];

    entries.forEach(([name, value], index) => {
        const isLast = index === entries.length - 1;
        const connector = isLast ? CONNECTOR_LAST : CONNECTOR_MIDDLE;

        if (typeof value === 'string') {
            lines.push({ prefix, connector, name, kind: 'file', summary: flattenSummary(value) });
            return;
        }

        lines.push({ prefix, connector, name, kind: 'directory' });
        collectLines(value, prefix + (isLast ? INDENT_LAST : INDENT_MIDDLE), lines);
    });
}

export function formatRenderLine(line: RenderLine): string {
    const head = `${line.prefix}${line.connector}${line.name}`;
    return line.kind === 'directory' ? `${head}/` : `${head}${SUMMARY_GAP}${line.summary ?? ''}`;
}

/**
 * Title, `=` underline and a blank line, then one newline-terminated line per entry.
 */
export function renderTreeText(tree: SummaryTree): string {
    const header = `${TREE_TITLE}\n${'='.repeat(TREE_TITLE.length)}\n\n`;
    return header + renderTree(tree).map(line => `${formatRenderLine(line)}\n`).join('');
}
