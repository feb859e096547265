export type CsvCell = string | number;

/**
 * Quote a CSV field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: CsvCell): string {
    const text = String(value);
    if (/[",\r\n]/.test(text)) {
        return `"${text.replace(/"/g, '""')}"`;
    }
    return text;
}

/**
 * Serialize rows to CSV. An empty row produces a blank line.
 */
export function toCsv(rows: ReadonlyArray<ReadonlyArray<CsvCell>>): string {
    return rows.map(row => row.map(escapeCsvField).join(',')).join('\n') + '\n';
}

/**
 * Render a page set as `1, 2, 5`
 */
export function formatPageList(pages: Iterable<number>): string {
    return [...pages].sort((a, b) => a - b).join(', ');
}
