export type ReportTable = {
  title: string;
  headers: readonly string[];
  rows: ReadonlyArray<readonly string[]>;
};

const linesOf = (cell: string): string[] => cell.split('\n');

// Code points, so astral characters count once. East Asian wide glyphs still
// take two terminal cells and will overhang their column.
const widthOf = (text: string): number => Array.from(text).length;

const pad = (text: string, width: number): string => text + ' '.repeat(Math.max(0, width - widthOf(text)));

/**
 * Renders a table as a plain-text grid.
 *
 * Cells may span several lines; every row is padded to its tallest cell and
 * followed by a rule line. Missing trailing cells render empty.
 */
export function renderTable(table: ReportTable): string {
  const columnCount = table.headers.length;
  const widths = table.headers.map(widthOf);

  for (const row of table.rows) {
    for (let c = 0; c < columnCount; c += 1) {
      for (const line of linesOf(row[c] ?? '')) {
        widths[c] = Math.max(widths[c], widthOf(line));
      }
    }
  }

  const rule = `+${widths.map((w) => '-'.repeat(w + 2)).join('+')}+`;

  const physicalLines = (cells: readonly string[]): string[] => {
    const split = widths.map((_, c) => linesOf(cells[c] ?? ''));
    const height = Math.max(1, ...split.map((lines) => lines.length));
    const out: string[] = [];
    for (let i = 0; i < height; i += 1) {
      out.push(`| ${split.map((lines, c) => pad(lines[i] ?? '', widths[c])).join(' | ')} |`);
    }
    return out;
  };

  const out = [table.title, rule, ...physicalLines(table.headers), rule];
  for (const row of table.rows) {
    out.push(...physicalLines(row), rule);
  }
  return `${out.join('\n')}\n`;
}
