import type { Request, RequestHandler, Response } from "express";
import { createLogger } from "../logger";
import { toFailure } from "../services/errors";
import type { BotView } from "../services/types";

const log = createLogger("http");

export function sendFailure(req: Request, res: Response, error: unknown) {
    const failure = toFailure(error);
    if (failure.status >= 500) {
        log.error("request_failed", { method: req.method, path: req.path, status: failure.status, error });
    } else {
        log.debug("request_rejected", { method: req.method, path: req.path, status: failure.status, error });
    }
    res.status(failure.status).json(failure.body);
}

/** Express 4 does not see rejected promises, so every async route goes through here. */
export const route =
    (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
    (req, res) => {
        handler(req, res).catch((error: unknown) => sendFailure(req, res, error));
    };

export interface BotWire {
    id: string;
    name: string;
    username: string;
    filepath: string;
    file_type: string;
    created_at: string;
    status: string;
    cpu: number;
    memory: number;
    pid?: number;
    started_at?: string;
}

export function toWire(view: BotView): BotWire {
    const wire: BotWire = {
        id: view.id,
        name: view.name,
        username: view.owner,
        filepath: view.filePath,
        file_type: view.fileType,
        created_at: view.createdAt,
        status: view.status,
        cpu: view.cpu,
        memory: view.memory,
    };
    if (view.pid !== undefined) wire.pid = view.pid;
    if (view.startedAt !== undefined) wire.started_at = view.startedAt;
    return wire;
}
