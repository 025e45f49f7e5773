import express from "express";
import cors from "cors";
import { createBotRouter } from "./routes/bot";
import { createBotsRouter } from "./routes/bots";
import type { BotSupervisor } from "./services/botSupervisor";

export interface AppOptions {
    maxUploadBytes: number;
}

export function createApp(supervisor: BotSupervisor, options: AppOptions) {
    const app = express();
    app.use(cors());
    app.use(express.json());

    app.get("/api/health", (_req, res) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    app.use("/api/bots", createBotsRouter(supervisor));
    app.use("/api/bot", createBotRouter(supervisor, { maxUploadBytes: options.maxUploadBytes }));

    return app;
}
