import type { IncomingMessage } from "http";
import type { Request } from "./types";

/** Decorate a raw request with params, query, body, path and locals */
export function createRequest(raw: IncomingMessage): Request {
    const url = parseUrl(raw);
    const extras: Pick<Request, "params" | "query" | "body" | "path" | "locals"> = {
        params: {},
        query: parseQuery(url.searchParams),
        body: undefined,
        path: url.pathname,
        locals: {},
    };
    return Object.assign(raw, extras);
}

function parseUrl(raw: IncomingMessage): URL {
    // Ensure we have an absolute URL for the URL parser. Host header fallback.
    const target = raw.url ?? "/";
    const host = `http://${raw.headers.host ?? "localhost"}`;
    const base = URL.canParse(host) ? host : "http://localhost";
    return URL.canParse(target, base) ? new URL(target, base) : new URL("/", base);
}

export function parseQuery(params: URLSearchParams): Record<string, string | string[]> {
    const qp: Record<string, string | string[]> = {};
    for (const [k, v] of params) {
        const prev = qp[k];
        if (prev === undefined) qp[k] = v;
        else if (Array.isArray(prev)) prev.push(v);
        else qp[k] = [prev, v];
    }
    return qp;
}
