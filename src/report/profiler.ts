/**
 * CSV data profiler: column names, two sample rows and the table shape.
 */

import { readFile } from 'fs/promises';
import type { DataProfiler } from './collaborators';

export interface CsvTable {
    columns: string[];
    rows: string[][];
}

/**
 * Split one CSV line. Handles quoted fields and doubled quotes.
 */
export function parseCsvLine(line: string): string[] {
    const fields: string[] = [];
    let current = '';
    let quoted = false;

    for (let i = 0; i < line.length; i++) {
        const char = line[i];
        if (quoted) {
            if (char === '"' && line[i + 1] === '"') {
                current += '"';
                i++;
            } else if (char === '"') {
                quoted = false;
            } else {
                current += char;
            }
        } else if (char === '"') {
            quoted = true;
        } else if (char === ',') {
            fields.push(current);
            current = '';
        } else {
            current += char;
        }
    }
    fields.push(current);
    return fields;
}

/**
 * Split CSV text into records. Line breaks inside quoted fields stay
 * part of the record.
 */
export function splitCsvRecords(text: string): string[] {
    const records: string[] = [];
    let start = 0;
    let quoted = false;

    for (let i = 0; i < text.length; i++) {
        const char = text[i];
        if (char === '"') {
            quoted = !quoted;
        } else if (char === '\n' && !quoted) {
            records.push(text.slice(start, text[i - 1] === '\r' ? i - 1 : i));
            start = i + 1;
        }
    }
    if (start < text.length) {
        records.push(text.slice(start));
    }
    return records;
}

export function parseCsv(text: string): CsvTable {
    const lines = splitCsvRecords(text).filter(line => line.trim() !== '');
    if (lines.length === 0) {
        return { columns: [], rows: [] };
    }
    const [header, ...body] = lines;
    return {
        columns: parseCsvLine(header).map(column => column.trim()),
        rows: body.map(parseCsvLine),
    };
}

export async function readCsv(csvPath: string): Promise<CsvTable> {
    return parseCsv(await readFile(csvPath, 'utf8'));
}

/**
 * Prompt-ready description of a table.
 */
export function describeTable(table: CsvTable, sampleRows = 2): string {
    const samples = table.rows.slice(0, sampleRows).map(row => {
        const record: Record<string, string> = {};
        table.columns.forEach((column, index) => {
            record[column] = row[index] ?? '';
        });
        return JSON.stringify(record);
    });

    return [
        `Columns: [${table.columns.join(', ')}]`,
        `Sample Data (first ${sampleRows} rows):`,
        ...samples,
        `Shape: (${table.rows.length}, ${table.columns.length})`,
    ].join('\n');
}

export function createCsvProfiler(): DataProfiler {
    return {
        async summarize(csvPath: string): Promise<string> {
            return describeTable(await readCsv(csvPath));
        },
    };
}
