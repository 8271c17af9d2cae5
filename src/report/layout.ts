import type { BlockNode, LayoutColumn, LayoutNode, ReportCell, SpacerSpan } from '../types/report.js';

export function spacer(width: number): SpacerSpan {
  return { kind: 'spacer', width };
}

/** Blocks separated by `gap`-wide spacers, no trailing spacer. */
export function joinBlocks(blocks: readonly BlockNode[], gap: number): LayoutNode[] {
  return blocks.flatMap((block, i): LayoutNode[] => (i === 0 ? [block] : [spacer(gap), block]));
}

export function flattenColumns(nodes: readonly LayoutNode[]): LayoutColumn[] {
  const columns: LayoutColumn[] = [];
  const pushSpacers = (width: number, group: string): void => {
    for (let i = 0; i < width; i++) columns.push({ kind: 'spacer', group, label: '', boxed: false });
  };

  for (const node of nodes) {
    if (node.kind === 'spacer') {
      pushSpacers(node.width, '');
      continue;
    }
    for (const span of node.spans) {
      if (span.kind === 'spacer') pushSpacers(span.width, node.label);
      else for (const label of span.columns) columns.push({ kind: 'data', group: node.label, label, boxed: span.boxed });
    }
  }
  return columns;
}

export function nodeWidth(node: LayoutNode): number {
  if (node.kind === 'spacer') return node.width;
  return node.spans.reduce((w, span) => w + (span.kind === 'spacer' ? span.width : span.columns.length), 0);
}

/**
 * Lay per-block values out along the flattened columns. `values` holds one
 * array per block, covering only that block's data columns in order; spacer
 * cells are always null.
 */
export function layoutRow(nodes: readonly LayoutNode[], values: ReadonlyArray<readonly ReportCell[]>): ReportCell[] {
  const cells: ReportCell[] = [];
  let blockIdx = 0;
  for (const node of nodes) {
    if (node.kind === 'spacer') {
      for (let i = 0; i < node.width; i++) cells.push(null);
      continue;
    }
    const blockValues = values[blockIdx++] ?? [];
    let v = 0;
    for (const span of node.spans) {
      if (span.kind === 'spacer') {
        for (let i = 0; i < span.width; i++) cells.push(null);
      } else {
        for (let i = 0; i < span.columns.length; i++) cells.push(blockValues[v++] ?? null);
      }
    }
  }
  return cells;
}
