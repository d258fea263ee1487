import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { accessReadable } from "@taskprint/shared";

export interface CsvRow {
    /** 1-based line number in the file */
    line: number;
    fields: Record<string, string>;
}

export interface SkippedRow {
    line: number;
    reason: string;
}

/**
 * Split one CSV line into fields.
 * Double-quoted fields may contain commas, "" is a literal quote.
 */
export function splitCsvLine(line: string): string[] {
    const out: string[] = [];
    let buf = "";
    let quoted = false;

    for (let i = 0; i < line.length; i++) {
        const c = line[i];

        if (quoted) {
            if (c === '"' && line[i + 1] === '"') {
                buf += '"';
                i++;
            } else if (c === '"') {
                quoted = false;
            } else {
                buf += c;
            }
            continue;
        }

        if (c === '"') {
            quoted = true;
        } else if (c === ",") {
            out.push(buf);
            buf = "";
        } else {
            buf += c;
        }
    }

    if (quoted) {
        throw new Error("unclosed double quote");
    }
    out.push(buf);
    return out;
}

export function escapeCsvField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export interface ReadCsvOptions {
    /** columns the header must name */
    required?: readonly string[];
    onSkip?: (row: SkippedRow) => void;
}

/**
 * Reads CSV from a stream with a header line. Blank lines are ignored, lines
 * that cannot be split are reported through onSkip. The stream is destroyed
 * when reading ends, fails or the caller stops early.
 */
export async function* readCsvStream(input: Readable, source: string, options: ReadCsvOptions = {}): AsyncGenerator<CsvRow> {
    const rl = createInterface({ input, crlfDelay: Infinity });

    let header: string[] | undefined;
    let line = 0;

    try {
        for await (const raw of rl) {
            line++;
            const text = raw.trim();
            if (text === "") continue;

            let values: string[];
            try {
                values = splitCsvLine(text);
            } catch (error) {
                options.onSkip?.({ line, reason: error instanceof Error ? error.message : String(error) });
                continue;
            }

            if (!header) {
                const columns = values.map((name) => name.trim());
                const missing = (options.required ?? []).filter((name) => !columns.includes(name));
                if (missing.length > 0) {
                    throw new Error(`${source}: missing column(s) ${missing.join(", ")}`);
                }
                header = columns;
                continue;
            }

            const fields: Record<string, string> = {};
            header.forEach((name, index) => {
                fields[name] = (values[index] ?? "").trim();
            });
            yield { line, fields };
        }
    } finally {
        rl.close();
        input.destroy();
    }

    if (!header) {
        throw new Error(`${source}: no header line`);
    }
}

/** readCsvStream over a file, after checking it can be read. */
export async function* readCsvRows(filePath: string, options: ReadCsvOptions = {}): AsyncGenerator<CsvRow> {
    const access = await accessReadable(filePath);
    if (!access.ok) {
        throw new Error(`${filePath}: ${access.error}`);
    }
    yield* readCsvStream(createReadStream(filePath, { encoding: "utf-8" }), filePath, options);
}
