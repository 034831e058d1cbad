import fs from "fs";
import path from "path";
import { pipeline } from "stream/promises";
import type { Middleware, StaticOptions } from "./types";

const CONTENT_TYPES: Record<string, string> = {
    ".html": "text/html; charset=utf-8",
    ".css": "text/css; charset=utf-8",
    ".js": "text/javascript; charset=utf-8",
    ".json": "application/json",
    ".txt": "text/plain; charset=utf-8",
    ".svg": "image/svg+xml",
    ".png": "image/png",
    ".jpg": "image/jpeg",
    ".ico": "image/x-icon",
};

/**
 * Serve files below `root`. The file is taken from the `*` route param; requests that
 * resolve outside the root get 403, missing files fall through to next().
 */
export function serveStatic(root: string, options: StaticOptions = {}): Middleware {
    const absRoot = path.resolve(root);
    const index = options.index ?? "index.html";
    const maxAge = options.maxAge ?? 0;

    return async (req, res, next) => {
        const target = path.resolve(absRoot, req.params["*"] ?? "");
        if (target !== absRoot && !target.startsWith(absRoot + path.sep)) {
            res.status(403).json({ error: "Forbidden" });
            return;
        }

        const file = await locate(target, index);
        if (!file) {
            await next();
            return;
        }

        res.setHeader("Content-Type", CONTENT_TYPES[path.extname(file.path).toLowerCase()] ?? "application/octet-stream");
        res.setHeader("Content-Length", file.size);
        res.setHeader("Cache-Control", `public, max-age=${maxAge}`);
        if (options.download) {
            res.setHeader("Content-Disposition", `attachment; filename="${path.basename(file.path)}"`);
        }

        if (req.method === "HEAD") {
            res.end();
            return;
        }
        await pipeline(fs.createReadStream(file.path), res);
    };
}

async function locate(target: string, index: string): Promise<{ path: string; size: number } | null> {
    const stats = await statOrNull(target);
    if (!stats) return null;
    if (stats.isFile()) return { path: target, size: stats.size };
    if (!stats.isDirectory()) return null;

    const indexPath = path.join(target, index);
    const indexStats = await statOrNull(indexPath);
    return indexStats?.isFile() ? { path: indexPath, size: indexStats.size } : null;
}

async function statOrNull(file: string): Promise<fs.Stats | null> {
    try {
        return await fs.promises.stat(file);
    } catch (err) {
        if (err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")) return null;
        throw err;
    }
}
