import { readdir, readFile } from "fs/promises";
import { extname, join, relative, sep } from "path";
import { languageForExtension } from "./preprocessor";
import type { SourceLanguage } from "../detection/types";

export interface StudentFiles {
    studentId: string;
    source: Array<{ path: string; language: SourceLanguage }>;
    hex: string[];
    /** Everything found, used to explain invalid submissions. */
    all: string[];
}

async function walk(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    const files: string[] = [];
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
            files.push(...(await walk(full)));
        } else if (entry.isFile()) {
            files.push(full);
        }
    }
    return files;
}

/**
 * Each first-level directory under `root` is one student; files are
 * collected recursively beneath it.  Loose files at the root are ignored.
 */
export async function crawlSubmissions(root: string): Promise<StudentFiles[]> {
    const entries = await readdir(root, { withFileTypes: true });
    const students: StudentFiles[] = [];

    for (const entry of entries.filter((e) => e.isDirectory()).sort((a, b) => a.name.localeCompare(b.name))) {
        const files = await walk(join(root, entry.name));
        const student: StudentFiles = { studentId: entry.name, source: [], hex: [], all: [] };

        for (const file of files) {
            student.all.push(relative(root, file).split(sep).join("/"));
            const ext = extname(file).toLowerCase();
            const language = languageForExtension(ext);
            if (language) {
                student.source.push({ path: file, language });
            } else if (ext === ".hex") {
                student.hex.push(file);
            }
        }

        students.push(student);
    }

    return students;
}

/** Decoders tried in order for files without a byte-order mark. */
const FALLBACK_ENCODINGS = ["utf-8", "big5"];

/**
 * Decode a text file written by any of the editors students use: UTF-8
 * (with or without BOM), UTF-16 by BOM, Big5, and finally latin1, which
 * never fails.
 */
export function decodeText(buffer: Buffer): string {
    if (buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf) {
        return new TextDecoder("utf-8").decode(buffer.subarray(3));
    }
    if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
        return new TextDecoder("utf-16le").decode(buffer.subarray(2));
    }
    if (buffer.length >= 2 && buffer[0] === 0xfe && buffer[1] === 0xff) {
        return new TextDecoder("utf-16be").decode(buffer.subarray(2));
    }

    for (const encoding of FALLBACK_ENCODINGS) {
        try {
            return new TextDecoder(encoding, { fatal: true }).decode(buffer);
        } catch {
            // not this encoding (or not supported by this ICU build), try the next
        }
    }
    return buffer.toString("latin1");
}

export async function readTextFile(path: string): Promise<string> {
    return decodeText(await readFile(path));
}
