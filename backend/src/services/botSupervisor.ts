import { spawn, type ChildProcess } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { createLogger } from "../logger";
import {
    BotNotFoundError,
    InvalidFileTypeError,
    ShuttingDownError,
    SpawnFailureError,
    UnsupportedFileTypeError,
} from "./errors";
import { DEFAULT_TAIL_LINES, LogSink, NO_LOGS_YET } from "./logSink";
import { ProcessTable } from "./processTable";
import { BotRegistry } from "./registry";
import { PidusageProbe, type StatsProbe } from "./statsProbe";
import { ScriptStore } from "./storage";
import {
    isBotFileType,
    type BotRecord,
    type BotView,
    type RunningProcess,
    type RuntimeTable,
    type StopOutcome,
} from "./types";

const log = createLogger("supervisor");

export interface SupervisorOptions {
    storageDir: string;
    maxBotsPerUser: number;
    runtimes: RuntimeTable;
    stopTimeoutMs?: number;
    killGraceMs?: number;
    logTailLines?: number;
    /** 0 turns the periodic sweep off; `reconcile()` can still be called directly. */
    reconcileIntervalMs?: number;
    statsProbe?: StatsProbe;
    now?: () => number;
}

export interface UploadInput {
    owner: string;
    name: string;
    fileName: string;
    contents: Buffer;
}

function hasExited(child: ChildProcess): boolean {
    return child.exitCode !== null || child.signalCode !== null;
}

function isAlive(entry: RunningProcess): boolean {
    if (hasExited(entry.handle)) return false;
    try {
        process.kill(entry.pid, 0);
        return true;
    } catch (error) {
        // EPERM means the pid exists but belongs to someone we cannot signal.
        if (error instanceof Error && "code" in error && error.code === "ESRCH") return false;
        log.debug("liveness_probe_failed", { botId: entry.botId, pid: entry.pid, error });
        return true;
    }
}

function waitForSpawn(child: ChildProcess): Promise<number> {
    return new Promise((resolve, reject) => {
        const onSpawn = () => {
            child.off("error", onError);
            if (typeof child.pid === "number") resolve(child.pid);
            else reject(new Error("process started without a pid"));
        };
        const onError = (error: Error) => {
            child.off("spawn", onSpawn);
            reject(error);
        };
        child.once("spawn", onSpawn);
        child.once("error", onError);
    });
}

/** Resolves true once the child has exited, false if `timeoutMs` passes first. */
function waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
    if (hasExited(child)) return Promise.resolve(true);
    return new Promise((resolve) => {
        const onExit = () => {
            clearTimeout(timer);
            resolve(true);
        };
        const timer = setTimeout(() => {
            child.off("exit", onExit);
            resolve(false);
        }, timeoutMs);
        child.once("exit", onExit);
    });
}

export class BotSupervisor {
    private readonly registry: BotRegistry;
    private readonly table = new ProcessTable();
    private readonly scripts: ScriptStore;
    private readonly logSink: LogSink;
    private readonly probe: StatsProbe;
    private readonly now: () => number;
    private readonly starting = new Map<string, Promise<RunningProcess>>();
    private readonly stopping = new Map<string, Promise<StopOutcome>>();
    private readonly deleting = new Set<string>();
    private sweep: NodeJS.Timeout | null = null;
    private closing = false;

    constructor(private readonly options: SupervisorOptions) {
        this.now = options.now ?? Date.now;
        this.scripts = new ScriptStore(path.resolve(options.storageDir));
        this.logSink = new LogSink(this.scripts.root);
        this.probe = options.statsProbe ?? new PidusageProbe();
        this.registry = new BotRegistry({
            maxBotsPerOwner: options.maxBotsPerUser,
            scriptPathFor: (botId, fileType) => this.scripts.pathFor(botId, fileType),
            now: this.now,
        });
        this.scripts.ensureRoot();

        const interval = options.reconcileIntervalMs ?? 0;
        if (interval > 0) {
            this.sweep = setInterval(() => this.reconcile(), interval);
            this.sweep.unref();
        }
    }

    async upload(input: UploadInput): Promise<BotRecord> {
        const dot = input.fileName.lastIndexOf(".");
        const fileType = dot === -1 ? "" : input.fileName.slice(dot + 1).toLowerCase();
        if (!isBotFileType(fileType)) {
            throw new InvalidFileTypeError(input.fileName);
        }

        const record = this.registry.create(input.owner, input.name, fileType);
        try {
            this.scripts.save(record.filePath, input.contents);
        } catch (error) {
            this.registry.remove(record.id);
            throw error;
        }
        log.info("bot_uploaded", { botId: record.id, owner: record.owner, fileType, bytes: input.contents.length });
        return record;
    }

    async start(botId: string): Promise<RunningProcess> {
        if (this.closing) throw new ShuttingDownError();
        const record = this.requireBot(botId);
        this.table.reserve(botId);

        const launch = this.launch(record);
        this.starting.set(botId, launch);
        try {
            return await launch;
        } finally {
            this.starting.delete(botId);
        }
    }

    async stop(botId: string): Promise<StopOutcome> {
        const inflight = this.stopping.get(botId);
        if (inflight) return inflight;

        const entry = this.table.get(botId);
        const termination = this.terminate(entry).finally(() => this.stopping.delete(botId));
        this.stopping.set(botId, termination);
        return termination;
    }

    async delete(botId: string): Promise<void> {
        const record = this.requireBot(botId);
        this.deleting.add(botId);
        try {
            const launch = this.starting.get(botId);
            if (launch) {
                await launch.then(
                    () => undefined,
                    (error: unknown) => log.debug("delete_start_settled", { botId, error }),
                );
            }

            if (this.table.has(botId) || this.stopping.has(botId)) {
                await this.forceStop(botId);
            }

            await this.cleanup("script", botId, () => this.scripts.remove(record.filePath));
            await this.cleanup("log", botId, () => this.logSink.remove(botId));
            this.registry.remove(botId);
            log.info("bot_deleted", { botId });
        } finally {
            this.deleting.delete(botId);
        }
    }

    async status(botId: string): Promise<BotView> {
        const record = this.registry.get(botId);
        return this.describe(record, this.table.peek(botId));
    }

    async listByOwner(owner: string): Promise<BotView[]> {
        const snapshot = this.registry
            .listByOwner(owner)
            .map((record) => [record, this.table.peek(record.id)] as const);
        return Promise.all(snapshot.map(([record, running]) => this.describe(record, running)));
    }

    async logs(botId: string): Promise<string> {
        this.registry.get(botId);
        const content = await this.logSink.tail(botId, this.options.logTailLines ?? DEFAULT_TAIL_LINES);
        return content ?? NO_LOGS_YET;
    }

    isRunning(botId: string): boolean {
        return this.table.has(botId);
    }

    /** Drops table entries whose process is gone. Returns the ids it removed. */
    reconcile(): string[] {
        const removed: string[] = [];
        for (const entry of this.table.list()) {
            if (this.stopping.has(entry.botId) || isAlive(entry)) continue;
            this.table.remove(entry.botId);
            removed.push(entry.botId);
        }
        if (removed.length > 0) {
            log.info("reconciled", { removed });
        }
        return removed;
    }

    /** Refuses new starts, lets in-flight ones land, then stops everything in the table. */
    async shutdown(): Promise<void> {
        this.closing = true;
        if (this.sweep) {
            clearInterval(this.sweep);
            this.sweep = null;
        }
        await Promise.allSettled([...this.starting.values()]);
        const running = this.table.list();
        const results = await Promise.allSettled(running.map((entry) => this.stop(entry.botId)));
        results.forEach((result, index) => {
            if (result.status === "rejected") {
                log.error("shutdown_stop_failed", { botId: running[index].botId, error: result.reason });
            }
        });
        log.info("shutdown", { stopped: running.length });
    }

    private requireBot(botId: string): BotRecord {
        if (this.deleting.has(botId)) throw new BotNotFoundError(botId);
        return this.registry.get(botId);
    }

    private async launch(record: BotRecord): Promise<RunningProcess> {
        const botId = record.id;
        const command = this.options.runtimes[record.fileType];
        if (!command) {
            this.table.release(botId);
            throw new UnsupportedFileTypeError(record.fileType);
        }

        const { child, pid } = await this.spawnBot(record, command).catch((error: unknown) => {
            this.table.release(botId);
            log.error("spawn_failed", { botId, command, error });
            throw new SpawnFailureError(botId, error);
        });

        const entry: RunningProcess = {
            botId,
            pid,
            handle: child,
            logPath: this.logSink.pathFor(botId),
            startedAt: new Date(this.now()).toISOString(),
        };
        this.table.insert(botId, entry);
        log.info("bot_started", { botId, pid, command });

        if (hasExited(child)) {
            // Exited before it was in the table, so onExit had nothing to drop.
            this.table.discard(botId, child);
        }
        return entry;
    }

    private async spawnBot(record: BotRecord, command: string): Promise<{ child: ChildProcess; pid: number }> {
        const fd = this.logSink.openForRun(record.id);
        try {
            const child = spawn(command, [record.filePath], {
                cwd: this.scripts.root,
                stdio: ["ignore", fd, fd],
            });
            child.on("error", (error) => log.warn("process_error", { botId: record.id, pid: child.pid, error }));
            child.once("exit", (code, signal) => this.onExit(record.id, child, code, signal));
            const pid = await waitForSpawn(child);
            return { child, pid };
        } finally {
            // The child holds its own copy of the descriptor.
            fs.closeSync(fd);
        }
    }

    private onExit(botId: string, child: ChildProcess, code: number | null, signal: NodeJS.Signals | null) {
        if (this.stopping.has(botId)) return;
        if (this.table.discard(botId, child)) {
            log.info("bot_exited", { botId, pid: child.pid, code, signal });
        }
    }

    private async terminate(entry: RunningProcess): Promise<StopOutcome> {
        const { botId, pid, handle } = entry;
        const stopTimeoutMs = this.options.stopTimeoutMs ?? 5000;
        let forced = false;

        if (!hasExited(handle)) {
            handle.kill("SIGTERM");
            if (!(await waitForExit(handle, stopTimeoutMs))) {
                forced = true;
                log.warn("termination_timeout", { botId, pid, timeoutMs: stopTimeoutMs });
                handle.kill("SIGKILL");
                if (!(await waitForExit(handle, this.options.killGraceMs ?? 2000))) {
                    log.error("kill_unconfirmed", { botId, pid });
                }
            }
        }

        this.table.discard(botId, handle);
        log.info("bot_stopped", { botId, pid, forced });
        return { botId, pid, forced };
    }

    // Deletion has to make progress even when the process misbehaves.
    private async forceStop(botId: string) {
        try {
            await this.stop(botId);
        } catch (error) {
            log.warn("delete_stop_failed", { botId, error });
            const entry = this.table.peek(botId);
            if (entry) {
                entry.handle.kill("SIGKILL");
                this.table.discard(botId, entry.handle);
            }
        }
    }

    private async cleanup(what: string, botId: string, step: () => Promise<boolean>) {
        try {
            await step();
        } catch (error) {
            log.warn("cleanup_failed", { botId, what, error });
        }
    }

    private async describe(record: BotRecord, running?: RunningProcess): Promise<BotView> {
        if (!running) {
            return { ...record, status: "stopped", cpu: 0, memory: 0 };
        }
        const sample = await this.probe.sample(running.pid);
        return {
            ...record,
            status: "running",
            cpu: sample.cpu,
            memory: sample.memory,
            pid: running.pid,
            startedAt: running.startedAt,
        };
    }
}
