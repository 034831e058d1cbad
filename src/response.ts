import type { ServerResponse } from "http";
import type { Response } from "./types";

export function createResponse(res: ServerResponse): Response {
    const r: Response = Object.assign(res, {
        status(code: number): Response {
            res.statusCode = code;
            return r;
        },

        json(data: unknown) {
            if (!res.headersSent) res.setHeader("Content-Type", "application/json");
            res.end(JSON.stringify(data));
        },

        send(data: unknown) {
            if (res.headersSent || data === undefined) {
                res.end();
            } else if (typeof data === "string" || Buffer.isBuffer(data)) {
                res.end(data);
            } else {
                res.setHeader("Content-Type", "application/json");
                res.end(JSON.stringify(data));
            }
        },
    });

    return r;
}
