import fs from "node:fs";
import path from "node:path";
import type { BotFileType } from "./types";

// Uploaded scripts live flat in the storage root next to their logs; file names come from the
// bot id, so two bots never share a path.
export class ScriptStore {
    constructor(readonly root: string) {}

    ensureRoot() {
        if (!fs.existsSync(this.root)) fs.mkdirSync(this.root, { recursive: true });
    }

    pathFor(botId: string, fileType: BotFileType): string {
        return path.join(this.root, `${botId}.${fileType}`);
    }

    save(filePath: string, contents: Buffer) {
        this.ensureRoot();
        const tmp = filePath + ".tmp";
        fs.writeFileSync(tmp, contents);
        fs.renameSync(tmp, filePath);
    }

    /** Resolves false when the file was already gone. */
    async remove(filePath: string): Promise<boolean> {
        try {
            await fs.promises.unlink(filePath);
            return true;
        } catch (error) {
            if (error instanceof Error && "code" in error && error.code === "ENOENT") return false;
            throw error;
        }
    }
}
