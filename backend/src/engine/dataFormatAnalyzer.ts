/**
 * Data format detection and structural profiling.
 *
 * Under the `auto` hint the detection order is fixed: JSON (strict parse),
 * then CSV (consistent delimiter, header plus data rows), then plain text.
 * The first rule that matches wins. An explicit `json` or `csv` hint never
 * falls back; malformed content raises FormatParseError instead.
 */

import {
    ColumnType,
    CsvProfile,
    DataFormatResult,
    FormatHint,
    JsonProfile,
    TextProfile,
} from '../types/index';
import { CsvTable, inspectCsv, readCsv } from './csvParser';
import { FormatParseError } from './errors';
import { extractFeatures } from './tokenizer';

const MAX_SAMPLE_ROWS = 3;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?$/;

type JsonParseOutcome = { ok: true; value: unknown } | { ok: false; reason: string };

function parseJson(text: string): JsonParseOutcome {
    const trimmed = text.trim();
    if (!trimmed) {
        return { ok: false, reason: 'content is empty' };
    }
    try {
        return { ok: true, value: JSON.parse(trimmed) };
    } catch (error) {
        return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }
}

export function profileJson(value: unknown): JsonProfile {
    if (Array.isArray(value)) {
        return { topLevelType: 'array', elementCount: value.length };
    }
    if (value !== null && typeof value === 'object') {
        const keys = Object.keys(value);
        return { topLevelType: 'object', keyCount: keys.length, keys };
    }
    if (value === null) {
        return { topLevelType: 'scalar', valueType: 'null' };
    }
    switch (typeof value) {
        case 'string':
            return { topLevelType: 'scalar', valueType: 'string' };
        case 'number':
            return { topLevelType: 'scalar', valueType: 'number' };
        default:
            return { topLevelType: 'scalar', valueType: 'boolean' };
    }
}

/**
 * Empty cells are treated as missing. A column is `integer` when every
 * remaining value is an integer, `float` when every value is numeric,
 * and `string` otherwise (including columns with no values at all).
 */
export function inferColumnType(values: readonly string[]): ColumnType {
    const present = values.filter(value => value.length > 0);
    if (present.length === 0) return 'string';
    if (present.every(value => INTEGER_PATTERN.test(value))) return 'integer';
    if (present.every(value => FLOAT_PATTERN.test(value) && Number.isFinite(Number(value)))) return 'float';
    return 'string';
}

export function profileCsv(table: CsvTable): CsvProfile {
    // Object.fromEntries defines own properties, so headers such as "__proto__" survive
    const columnTypes: Record<string, ColumnType> = Object.fromEntries(
        table.headers.map((header, index): [string, ColumnType] => [header, inferColumnType(table.rows.map(row => row[index] ?? ''))])
    );

    const sampleRows = table.rows
        .slice(0, MAX_SAMPLE_ROWS)
        .map(row => Object.fromEntries(table.headers.map((header, index): [string, string] => [header, row[index] ?? ''])));

    return {
        columns: [...table.headers],
        columnCount: table.headers.length,
        rowCount: table.rows.length,
        columnTypes,
        delimiter: table.delimiter,
        sampleRows,
    };
}

export function profileText(text: string): TextProfile {
    const features = extractFeatures(text);
    return {
        lineCount: text.length > 0 ? text.split(/\r\n|\r|\n/).length : 0,
        wordCount: features.wordCount,
        characterCount: features.charCount,
        sentenceCount: features.sentenceCount,
        avgWordLength: features.avgWordLength,
    };
}

function detectFormat(text: string): DataFormatResult {
    if (text.includes('\u0000')) {
        return {
            detectedFormat: 'unknown',
            structure: { characterCount: Array.from(text).length, reason: 'content contains NUL characters' },
        };
    }

    const json = parseJson(text);
    if (json.ok) {
        return { detectedFormat: 'json', structure: profileJson(json.value) };
    }

    const csv = inspectCsv(text, { requireMultipleColumns: true });
    if (csv.ok) {
        return { detectedFormat: 'csv', structure: profileCsv(csv.table) };
    }

    return { detectedFormat: 'text', structure: profileText(text) };
}

export function analyzeDataFormat(text: string, formatHint: FormatHint = 'auto'): DataFormatResult {
    switch (formatHint) {
        case 'json': {
            const json = parseJson(text);
            if (!json.ok) {
                throw new FormatParseError('json', json.reason);
            }
            return { detectedFormat: 'json', structure: profileJson(json.value) };
        }
        case 'csv':
            return { detectedFormat: 'csv', structure: profileCsv(readCsv(text)) };
        case 'text':
            return { detectedFormat: 'text', structure: profileText(text) };
        case 'auto':
            return detectFormat(text);
    }
}
