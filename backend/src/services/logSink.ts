import fs from "node:fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";

export const NO_LOGS_YET = "No logs available yet";

export const DEFAULT_TAIL_LINES = 1000;

/** Last `maxLines` lines of `content`. A final newline ends the last line, it does not open a new one. */
export function tailLines(content: string, maxLines: number): string {
    const lines = content.split("\n");
    const trailingNewline = lines.length > 1 && lines[lines.length - 1] === "";
    if (trailingNewline) lines.pop();
    if (lines.length <= maxLines) return content;
    return lines.slice(-maxLines).join("\n") + (trailingNewline ? "\n" : "");
}

export const TAIL_CHUNK_BYTES = 64 * 1024;

function countNewlines(chunk: Buffer): number {
    let count = 0;
    for (let at = chunk.indexOf(0x0a); at !== -1; at = chunk.indexOf(0x0a, at + 1)) count++;
    return count;
}

const isMissing = (error: unknown) =>
    error instanceof Error && "code" in error && error.code === "ENOENT";

/** One `<bot id>.log` per bot, rewritten on every run and shared by the child's stdout and stderr. */
export class LogSink {
    constructor(private readonly root: string) {}

    pathFor(botId: string): string {
        return path.join(this.root, `${botId}.log`);
    }

    /** Truncates the bot's log and returns a descriptor the caller must close after spawning. */
    openForRun(botId: string): number {
        return fs.openSync(this.pathFor(botId), "w");
    }

    /**
     * Reads backwards from the end of the log until it has seen one newline more than `maxLines`,
     * so the cost follows the tail, not the file.
     */
    async tail(botId: string, maxLines = DEFAULT_TAIL_LINES): Promise<string | null> {
        let handle: FileHandle;
        try {
            handle = await fs.promises.open(this.pathFor(botId), "r");
        } catch (error) {
            if (isMissing(error)) return null;
            throw error;
        }

        try {
            const { size } = await handle.stat();
            const chunks: Buffer[] = [];
            let position = size;
            let newlines = 0;
            while (position > 0 && newlines <= maxLines) {
                const length = Math.min(TAIL_CHUNK_BYTES, position);
                position -= length;
                const chunk = Buffer.alloc(length);
                const { bytesRead } = await handle.read(chunk, 0, length, position);
                const read = chunk.subarray(0, bytesRead);
                chunks.unshift(read);
                newlines += countNewlines(read);
            }
            // A multi-byte character cut at the first chunk's edge only lands in the dropped partial line.
            return tailLines(Buffer.concat(chunks).toString("utf8"), maxLines);
        } finally {
            await handle.close();
        }
    }

    /** Resolves false when there was nothing to remove. */
    async remove(botId: string): Promise<boolean> {
        try {
            await fs.promises.unlink(this.pathFor(botId));
            return true;
        } catch (error) {
            if (isMissing(error)) return false;
            throw error;
        }
    }
}
