import express from "express";
import type { BotSupervisor } from "../services/botSupervisor";
import { route, toWire } from "./respond";

export function createBotsRouter(supervisor: BotSupervisor) {
    const router = express.Router();

    router.get(
        "/:username",
        route(async (req, res) => {
            const bots = await supervisor.listByOwner(req.params.username);
            res.json({ success: true, bots: bots.map(toWire) });
        }),
    );

    return router;
}
