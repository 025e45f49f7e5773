import type { ChildProcess } from "node:child_process";
import { AlreadyRunningError, NotRunningError } from "./errors";
import type { RunningProcess } from "./types";

/**
 * Live processes keyed by bot id. A start first takes a reservation so that the slot is claimed
 * before the spawn is awaited; the entry replaces the reservation once the child is up.
 */
export class ProcessTable {
    private readonly entries = new Map<string, RunningProcess>();
    private readonly reserved = new Set<string>();

    reserve(botId: string) {
        if (this.entries.has(botId) || this.reserved.has(botId)) {
            throw new AlreadyRunningError(botId);
        }
        this.reserved.add(botId);
    }

    release(botId: string) {
        this.reserved.delete(botId);
    }

    isReserved(botId: string): boolean {
        return this.reserved.has(botId);
    }

    insert(botId: string, proc: RunningProcess) {
        if (this.entries.has(botId)) {
            throw new AlreadyRunningError(botId);
        }
        this.reserved.delete(botId);
        this.entries.set(botId, proc);
    }

    get(botId: string): RunningProcess {
        const entry = this.entries.get(botId);
        if (!entry) throw new NotRunningError(botId);
        return entry;
    }

    peek(botId: string): RunningProcess | undefined {
        return this.entries.get(botId);
    }

    has(botId: string): boolean {
        return this.entries.has(botId);
    }

    /** Takes the entry out. Terminating the process is the caller's job. */
    remove(botId: string): RunningProcess {
        const entry = this.get(botId);
        this.entries.delete(botId);
        return entry;
    }

    /** Removes the entry only while it still belongs to `handle`; a newer run is left alone. */
    discard(botId: string, handle: ChildProcess): boolean {
        if (this.entries.get(botId)?.handle !== handle) return false;
        this.entries.delete(botId);
        return true;
    }

    list(): RunningProcess[] {
        return [...this.entries.values()];
    }

    get size(): number {
        return this.entries.size;
    }
}
