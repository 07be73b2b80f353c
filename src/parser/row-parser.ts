export type RawRow = Record<string, string>;

/**
 * Lazily split BioMart TSV output into rows keyed by field name.
 *
 * Fields are matched by position; BioMart sends no header line. A short line
 * yields a row without its trailing fields, extra columns are ignored and
 * blank lines yield nothing.
 */
export function* iterRows(text: string, fieldNames: readonly string[]): Generator<RawRow> {
    for (const line of text.split('\n')) {
        if (line === '') continue;

        const values = line.split('\t');
        const row: RawRow = {};
        const width = Math.min(values.length, fieldNames.length);
        for (let i = 0; i < width; i++) {
            row[fieldNames[i]] = values[i];
        }
        yield row;
    }
}

/**
 * Absent and empty fields both mean "not applicable".
 */
export function fieldValue(row: RawRow, field: string): string {
    return row[field] ?? '';
}
