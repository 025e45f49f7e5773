import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { createLogger, setLogLevel } from "./logger";
import { BotSupervisor } from "./services/botSupervisor";

const log = createLogger("server");

const config = loadConfig();
setLogLevel(config.logLevel);

const supervisor = new BotSupervisor({
    storageDir: config.storageDir,
    maxBotsPerUser: config.maxBotsPerUser,
    runtimes: config.runtimes,
    stopTimeoutMs: config.stopTimeoutMs,
    killGraceMs: config.killGraceMs,
    logTailLines: config.logTailLines,
    reconcileIntervalMs: config.reconcileIntervalMs,
});

const app = createApp(supervisor, { maxUploadBytes: config.maxUploadBytes });

const server = app.listen(config.port, () => {
    log.info("server_listening", { port: config.port, storageDir: config.storageDir });
});

let closing = false;

async function shutdown(signal: NodeJS.Signals) {
    if (closing) return;
    closing = true;
    log.info("shutdown_requested", { signal });
    // No new requests may reach the supervisor once it starts stopping bots.
    const closed = new Promise<Error | undefined>((resolve) => server.close(resolve));
    await supervisor.shutdown();
    const error = await closed;
    if (error) log.error("server_close_failed", { error });
    process.exit(error ? 1 : 0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
        shutdown(signal).catch((error: unknown) => {
            log.error("shutdown_failed", { error });
            process.exit(1);
        });
    });
}
