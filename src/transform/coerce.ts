import { z } from 'zod';
import { RowFormatError } from '../errors.js';
import { RawRow, fieldValue } from '../parser/row-parser.js';

// Plain decimal integers only: no exponents, hex or fractions
const integerField = z.string().regex(/^[+-]?\d+$/).transform(Number);

export function optionalInt(dataset: string, row: RawRow, field: string): number | null {
    const raw = fieldValue(row, field).trim();
    if (raw === '') return null;

    const parsed = integerField.safeParse(raw);
    if (!parsed.success) {
        throw new RowFormatError(dataset, field, raw);
    }
    return parsed.data;
}

export function requiredInt(dataset: string, row: RawRow, field: string): number {
    const value = optionalInt(dataset, row, field);
    if (value === null) {
        throw new RowFormatError(dataset, field, '');
    }
    return value;
}
