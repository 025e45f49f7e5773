import { BotNotFoundError, QuotaExceededError } from "./errors";
import type { BotFileType, BotRecord } from "./types";

export interface RegistryOptions {
    maxBotsPerOwner: number;
    scriptPathFor: (botId: string, fileType: BotFileType) => string;
    now?: () => number;
}

/** Reduces a user-supplied label to characters that are safe in a URL path segment. */
export function toIdSegment(value: string): string {
    const cleaned = value
        .trim()
        .replace(/[^A-Za-z0-9_.-]+/g, "-")
        .replace(/^[-.]+|[-.]+$/g, "");
    return cleaned || "bot";
}

export class BotRegistry {
    private readonly records = new Map<string, BotRecord>();
    private readonly now: () => number;

    constructor(private readonly options: RegistryOptions) {
        this.now = options.now ?? Date.now;
    }

    create(owner: string, name: string, fileType: BotFileType): BotRecord {
        const limit = this.options.maxBotsPerOwner;
        if (this.countByOwner(owner) >= limit) {
            throw new QuotaExceededError(owner, limit);
        }

        const id = this.nextId(owner, name);
        const record: BotRecord = {
            id,
            name,
            owner,
            filePath: this.options.scriptPathFor(id, fileType),
            fileType,
            createdAt: new Date(this.now()).toISOString(),
        };
        this.records.set(id, record);
        return record;
    }

    get(botId: string): BotRecord {
        const record = this.records.get(botId);
        if (!record) throw new BotNotFoundError(botId);
        return record;
    }

    has(botId: string): boolean {
        return this.records.has(botId);
    }

    listByOwner(owner: string): BotRecord[] {
        return [...this.records.values()].filter((r) => r.owner === owner);
    }

    countByOwner(owner: string): number {
        let count = 0;
        for (const record of this.records.values()) {
            if (record.owner === owner) count += 1;
        }
        return count;
    }

    remove(botId: string): BotRecord {
        const record = this.get(botId);
        this.records.delete(botId);
        return record;
    }

    // Ids carry a unix timestamp; two uploads in the same second move the later one forward.
    private nextId(owner: string, name: string): string {
        const prefix = `${toIdSegment(owner)}_${toIdSegment(name)}`;
        let seconds = Math.floor(this.now() / 1000);
        while (this.records.has(`${prefix}_${seconds}`)) {
            seconds += 1;
        }
        return `${prefix}_${seconds}`;
    }
}
