import type { ChildProcess } from "node:child_process";

export const BOT_FILE_TYPES = ["py", "js"] as const;

export type BotFileType = (typeof BOT_FILE_TYPES)[number];

export type BotStatus = "running" | "stopped";

export function isBotFileType(value: string): value is BotFileType {
    return (BOT_FILE_TYPES as readonly string[]).includes(value);
}

export interface BotRecord {
    id: string;
    name: string;
    owner: string;
    filePath: string;
    fileType: BotFileType;
    createdAt: string;
}

export interface RunningProcess {
    botId: string;
    pid: number;
    handle: ChildProcess;
    logPath: string;
    startedAt: string;
}

export interface ProcessSample {
    cpu: number;
    memory: number;
}

export interface BotView extends BotRecord, ProcessSample {
    status: BotStatus;
    pid?: number;
    startedAt?: string;
}

export interface StopOutcome {
    botId: string;
    pid: number;
    forced: boolean;
}

/** Launch command per runtime; a missing entry means the runtime is disabled on this host. */
export type RuntimeTable = Partial<Record<BotFileType, string>>;
