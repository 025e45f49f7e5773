import { setTimeout as sleep } from "node:timers/promises";
import pidusage from "pidusage";
import { createLogger } from "../logger";
import type { ProcessSample } from "./types";

const log = createLogger("stats");

export interface StatsProbe {
    sample(pid: number): Promise<ProcessSample>;
}

export const EMPTY_SAMPLE: ProcessSample = { cpu: 0, memory: 0 };

const BYTES_PER_MB = 1024 * 1024;

const round2 = (value: number) => Math.round(value * 100) / 100;

/**
 * CPU and resident memory through pidusage. pidusage reports CPU relative to its previous reading
 * of the same pid, so the first read only primes it and the second covers the sample window.
 */
export class PidusageProbe implements StatsProbe {
    constructor(private readonly windowMs = 100) {}

    async sample(pid: number): Promise<ProcessSample> {
        try {
            await pidusage(pid);
            await sleep(this.windowMs);
            const stats = await pidusage(pid);
            return {
                cpu: round2(stats.cpu),
                memory: round2(stats.memory / BYTES_PER_MB),
            };
        } catch (error) {
            log.debug("sample_unavailable", { pid, error });
            return { ...EMPTY_SAMPLE };
        }
    }
}
