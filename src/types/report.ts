export type ReportCell = number | null;

export interface DataSpan {
  kind: 'data';
  columns: string[];
  boxed: boolean;           // renderer draws a grid around header + data rows
}

export interface SpacerSpan {
  kind: 'spacer';
  width: number;
}

export interface BlockNode {
  kind: 'block';
  label: string;            // day label, rendered merged above the block
  spans: Array<DataSpan | SpacerSpan>;
}

export type LayoutNode = BlockNode | SpacerSpan;

/** A flattened column, in sheet order (index column excluded). */
export interface LayoutColumn {
  kind: 'data' | 'spacer';
  group: string;            // owning block label, '' for spacers between blocks
  label: string;            // '' for spacers
  boxed: boolean;
}

export interface ReportRow {
  index: ReportCell;
  cells: ReportCell[];      // aligned with flattenColumns(nodes)
}

export interface ReportTable {
  sheetName: string;
  indexLabel: string;
  hideIndex: boolean;
  nodes: LayoutNode[];
  rows: ReportRow[];
}
