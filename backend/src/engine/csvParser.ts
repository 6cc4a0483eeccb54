import { FormatParseError } from './errors';

export const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'] as const;

export interface CsvTable {
    headers: string[];
    rows: string[][];
    delimiter: string;
}

export type CsvInspection =
    | { ok: true; table: CsvTable }
    | { ok: false; reason: string };

export interface CsvReadOptions {
    /** Require the header to split into at least two columns. */
    requireMultipleColumns?: boolean;
}

const sanitizeText = (text: string): string =>
    text
        .replace(/^\uFEFF/, '')
        .replace(/\r\n/g, '\n')
        .replace(/\r/g, '\n');

export function detectDelimiter(headerLine: string): string {
    let best: string = CANDIDATE_DELIMITERS[0];
    let bestCount = 0;
    for (const candidate of CANDIDATE_DELIMITERS) {
        const count = headerLine.split(candidate).length - 1;
        if (count > bestCount) {
            best = candidate;
            bestCount = count;
        }
    }
    return best;
}

/**
 * Splits delimited text into records. Quoted fields may contain the
 * delimiter, newlines and doubled quotes. Blank lines are dropped.
 */
export function parseDelimited(text: string, delimiter: string): { records: string[][]; unterminatedQuote: boolean } {
    const records: string[][] = [];
    let record: string[] = [];
    let field = '';
    let inQuotes = false;

    for (let index = 0; index < text.length; index += 1) {
        const char = text[index];

        if (inQuotes) {
            if (char === '"') {
                if (text[index + 1] === '"') {
                    field += '"';
                    index += 1;
                } else {
                    inQuotes = false;
                }
            } else {
                field += char;
            }
            continue;
        }

        if (char === '"') {
            inQuotes = true;
            continue;
        }

        if (char === delimiter) {
            record.push(field);
            field = '';
            continue;
        }

        if (char === '\n') {
            record.push(field);
            records.push(record);
            record = [];
            field = '';
            continue;
        }

        field += char;
    }

    if (field.length > 0 || record.length > 0) {
        record.push(field);
        records.push(record);
    }

    return {
        records: records.filter(r => !(r.length === 1 && r[0].trim().length === 0)),
        unterminatedQuote: inQuotes,
    };
}

function buildHeaders(rawHeaders: string[]): string[] {
    const used = new Set<string>();
    return rawHeaders.map((header, index) => {
        const trimmed = header.trim();
        const base = trimmed ? trimmed : `Column ${index + 1}`;
        let name = base;
        for (let suffix = 2; used.has(name); suffix += 1) {
            name = `${base}_${suffix}`;
        }
        used.add(name);
        return name;
    });
}

export function inspectCsv(text: string, options: CsvReadOptions = {}): CsvInspection {
    const sanitized = sanitizeText(text);
    const headerLine = sanitized.split('\n').find(line => line.trim().length > 0);
    if (headerLine === undefined) {
        return { ok: false, reason: 'content is empty' };
    }

    const delimiter = detectDelimiter(headerLine);
    const { records, unterminatedQuote } = parseDelimited(sanitized, delimiter);
    if (unterminatedQuote) {
        return { ok: false, reason: 'unterminated quoted field' };
    }

    if (records.length === 0) {
        return { ok: false, reason: 'content is empty' };
    }

    const [rawHeaders, ...rows] = records;
    if (options.requireMultipleColumns && rawHeaders.length < 2) {
        return { ok: false, reason: 'header has a single column' };
    }
    if (rows.length === 0) {
        return { ok: false, reason: 'expected a header row and at least one data row' };
    }

    const raggedIndex = rows.findIndex(row => row.length !== rawHeaders.length);
    if (raggedIndex !== -1) {
        return {
            ok: false,
            reason: `row ${raggedIndex + 1} has ${rows[raggedIndex].length} fields, expected ${rawHeaders.length}`,
        };
    }

    return {
        ok: true,
        table: {
            headers: buildHeaders(rawHeaders),
            rows: rows.map(row => row.map(value => value.trim())),
            delimiter,
        },
    };
}

export function readCsv(text: string, options: CsvReadOptions = {}): CsvTable {
    const inspection = inspectCsv(text, options);
    if (!inspection.ok) {
        throw new FormatParseError('csv', inspection.reason);
    }
    return inspection.table;
}
