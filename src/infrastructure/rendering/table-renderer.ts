import Table from 'cli-table3';
import type { TableMatrix } from '../../core/conversion/types.js';
import { assertNever } from '../../runtime/assert-never.js';

export const TABLE_FORMATS = ['grid', 'markdown', 'csv'] as const;
export type TableFormat = (typeof TABLE_FORMATS)[number];

export interface RenderOptions {
  /** Row 0 is the header. */
  readonly includeHeader: boolean;
  readonly format: TableFormat;
}

/**
 * Pad every row with empty cells up to the widest row.
 * Returns a new matrix; the input is left alone.
 */
export function padRows(matrix: TableMatrix): TableMatrix {
  const width = matrix.reduce((max, row) => Math.max(max, row.length), 0);
  return matrix.map((row) => {
    const padded = [...row];
    while (padded.length < width) padded.push('');
    return padded;
  });
}

export class TableRenderer {
  render(matrix: TableMatrix, options: RenderOptions): string {
    const rows = padRows(matrix);
    if (rows.length === 0 || rows[0]?.length === 0) return '';

    const head = options.includeHeader ? rows[0] : undefined;
    const body = options.includeHeader ? rows.slice(1) : rows;

    switch (options.format) {
      case 'grid':
        return renderGrid(head, body);
      case 'markdown':
        return renderMarkdown(head, body, rows[0]?.length ?? 0);
      case 'csv':
        return renderCsv(head ? [head, ...body] : body);
      default:
        return assertNever(options.format);
    }
  }
}

function renderGrid(head: string[] | undefined, body: TableMatrix): string {
  const table = new Table({
    head: head ?? [],
    style: { head: [], border: [] },
  });
  table.push(...body);
  return table.toString();
}

function escapeMarkdownCell(cell: string): string {
  return cell.replace(/\|/g, '\\|').replace(/\r?\n/g, '<br>');
}

function renderMarkdown(head: string[] | undefined, body: TableMatrix, width: number): string {
  const line = (cells: readonly string[]) => `| ${cells.map(escapeMarkdownCell).join(' | ')} |`;
  // Markdown tables need a head row; a headerless matrix gets a blank one.
  const headCells = head ?? Array.from({ length: width }, () => '');
  const separator = `|${headCells.map(() => ' --- ').join('|')}|`;
  return [line(headCells), separator, ...body.map(line)].join('\n');
}

function escapeCsvField(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

function renderCsv(rows: TableMatrix): string {
  return rows.map((row) => row.map(escapeCsvField).join(',')).join('\n');
}
