/**
 * Table rendering
 *
 * Backends that detect tables hand us rows of cells. Questions refer to
 * those tables in prose ("You have the following users:"), so the table is
 * rendered as bordered text and spliced in right after that sentence.
 */

export type TableRows = ReadonlyArray<ReadonlyArray<string | null | undefined>>;

/**
 * Bordered text rendering of a table. Null when fewer than two rows carry
 * any content.
 *
 *   +------+-------+
 *   | Name | Role  |
 *   +------+-------+
 *   | User1| Owner |
 *   +------+-------+
 */
export function formatTableAsText(table: TableRows): string | null {
  if (table.length < 2) return null;

  const rows = table
    .map((row) => row.map((cell) => (cell ? String(cell).trim() : "")))
    .filter((row) => row.some((cell) => cell.length > 0));
  if (rows.length < 2) return null;

  const columnCount = Math.max(...rows.map((row) => row.length));
  const widths = Array.from({ length: columnCount }, (_, i) =>
    Math.max(...rows.map((row) => (row[i] ?? "").length)),
  );

  const separator = "+" + widths.map((w) => "-".repeat(w + 2)).join("+") + "+";
  const lines: string[] = [];

  rows.forEach((row, rowIndex) => {
    const cells = widths.map((w, i) => ` ${(row[i] ?? "").padEnd(w)} `);
    if (rowIndex === 0) lines.push(separator);
    lines.push("|" + cells.join("|") + "|");
    if (rowIndex === 0) lines.push(separator);
  });
  lines.push(separator);

  return lines.join("\n");
}

const TABLE_ANCHORS = [
  /following\s+(?:users|resources|virtual machines|storage accounts|subscriptions)[^:]*:/i,
  /contains\s+the\s+following[^:]*:/i,
  /shown\s+in\s+the\s+following[^:]*:/i,
];

/** Insert rendered tables after the sentence introducing them */
export function mergeTablesWithText(text: string, tables: string[]): string {
  if (tables.length === 0) return text;

  const section = "\n\n" + tables.join("\n\n");

  for (const anchor of TABLE_ANCHORS) {
    const match = anchor.exec(text);
    if (match) {
      const at = match.index + match[0].length;
      return text.slice(0, at) + section + text.slice(at);
    }
  }

  const firstParagraphEnd = text.indexOf("\n\n");
  if (firstParagraphEnd > 0) {
    return text.slice(0, firstParagraphEnd) + section + text.slice(firstParagraphEnd);
  }

  return text + section;
}
