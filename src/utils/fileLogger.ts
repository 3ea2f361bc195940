/**
 * src/utils/fileLogger.ts
 *
 * Mirrors everything written to stdout/stderr (Crawlee's log included) into
 * a log file next to the working directory.
 *
 *  • initFileLogger() truncates the file, so every run starts clean.
 *  • Writing stops with a notice once the file reaches MAX_LOG_BYTES; the
 *    console keeps receiving output.
 *  • closeFileLogger() restores the original streams and closes the file.
 */

import * as fs from 'fs';
import * as path from 'path';

const MAX_LOG_BYTES = 25 * 1024 * 1024;

type WriteCallback = (err?: Error | null) => void;

let writeStream: fs.WriteStream | null = null;
let bytesWritten = 0;
let capped = false;
const restorers: Array<() => void> = [];

function appendToFile(chunk: string | Uint8Array): void {
    if (!writeStream || capped) return;

    const size = typeof chunk === 'string' ? Buffer.byteLength(chunk) : chunk.byteLength;
    if (bytesWritten + size > MAX_LOG_BYTES) {
        capped = true;
        writeStream.write(`\n--- LOG CAPPED AT ${new Date().toISOString()} (${MAX_LOG_BYTES} bytes) ---\n`);
        return;
    }

    bytesWritten += size;
    writeStream.write(chunk);
}

function tee(stream: NodeJS.WriteStream): void {
    const original = stream.write.bind(stream);

    stream.write = (
        chunk: string | Uint8Array,
        encodingOrCallback?: BufferEncoding | WriteCallback,
        callback?: WriteCallback,
    ): boolean => {
        appendToFile(chunk);
        if (typeof encodingOrCallback === 'function') {
            return original(chunk, encodingOrCallback);
        }
        return original(chunk, encodingOrCallback, callback);
    };

    restorers.push(() => {
        stream.write = original;
    });
}

/**
 * Call once at the very start of main(), before any log output.
 * Returns the absolute path of the log file.
 */
export function initFileLogger(fileName = 'log.txt'): string {
    const logFile = path.resolve(process.cwd(), fileName);

    fs.writeFileSync(logFile, '', 'utf-8');
    writeStream = fs.createWriteStream(logFile, { flags: 'a', encoding: 'utf-8' });
    bytesWritten = 0;
    capped = false;

    tee(process.stdout);
    tee(process.stderr);

    return logFile;
}

/** Flush and close the log file. Call in the finally/cleanup block. */
export function closeFileLogger(): void {
    while (restorers.length > 0) {
        restorers.pop()?.();
    }
    if (writeStream) {
        writeStream.end();
        writeStream = null;
    }
}
