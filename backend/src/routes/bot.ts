import express, { type RequestHandler } from "express";
import multer from "multer";
import { z } from "zod";
import type { BotSupervisor } from "../services/botSupervisor";
import { InvalidUploadError } from "../services/errors";
import { route, sendFailure, toWire } from "./respond";

const UploadFields = z.object({
    username: z.string().trim().min(1),
    bot_name: z.string().trim().min(1),
});

export interface BotRouterOptions {
    maxUploadBytes: number;
}

export function createBotRouter(supervisor: BotSupervisor, options: BotRouterOptions) {
    const router = express.Router();
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: options.maxUploadBytes, files: 1 },
    });

    const receiveScript: RequestHandler = (req, res, next) => {
        upload.single("bot_file")(req, res, (error: unknown) => {
            if (!error) return next();
            const message =
                error instanceof multer.MulterError && error.code === "LIMIT_FILE_SIZE"
                    ? `File too large: limit is ${options.maxUploadBytes} bytes`
                    : error instanceof Error
                      ? error.message
                      : String(error);
            sendFailure(req, res, new InvalidUploadError(message));
        });
    };

    router.post(
        "/upload",
        receiveScript,
        route(async (req, res) => {
            if (!req.file) throw new InvalidUploadError("No file uploaded");
            const fields = UploadFields.safeParse(req.body);
            if (!fields.success) throw new InvalidUploadError("Missing username or bot_name");

            const bot = await supervisor.upload({
                owner: fields.data.username,
                name: fields.data.bot_name,
                fileName: req.file.originalname,
                contents: req.file.buffer,
            });
            res.json({ success: true, message: "Bot uploaded successfully", bot_id: bot.id });
        }),
    );

    router.post(
        "/start/:botId",
        route(async (req, res) => {
            const proc = await supervisor.start(req.params.botId);
            res.json({ success: true, message: "Bot started successfully", pid: proc.pid });
        }),
    );

    router.post(
        "/stop/:botId",
        route(async (req, res) => {
            const outcome = await supervisor.stop(req.params.botId);
            res.json({
                success: true,
                message: outcome.forced ? "Bot force-stopped" : "Bot stopped successfully",
            });
        }),
    );

    router.delete(
        "/delete/:botId",
        route(async (req, res) => {
            await supervisor.delete(req.params.botId);
            res.json({ success: true, message: "Bot deleted successfully" });
        }),
    );

    router.get(
        "/logs/:botId",
        route(async (req, res) => {
            const logs = await supervisor.logs(req.params.botId);
            res.json({ success: true, logs });
        }),
    );

    router.get(
        "/status/:botId",
        route(async (req, res) => {
            const bot = await supervisor.status(req.params.botId);
            res.json({ success: true, bot: toWire(bot) });
        }),
    );

    return router;
}
