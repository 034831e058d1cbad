import type { IncomingMessage, ServerResponse } from "http";
import type { Group } from "./group";

/** Request methods an app accepts when none are configured */
export const DEFAULT_METHODS = ["GET", "HEAD", "POST", "PUT", "DELETE", "CONNECT", "OPTIONS", "TRACE", "PATCH"] as const;

/** Wildcard method of middleware-only registrations: any method, any path below the prefix */
export const METHOD_USE = "USE";

/** Typed request with generics for params, query, body */
export interface Request<P = Record<string, string>, Q = Record<string, string | string[]>, B = unknown>
    extends IncomingMessage {
    params: P;
    query: Q;
    body: B;
    /** pathname the router matched against, still percent-encoded */
    path: string;
    // per-request scratch space for middleware
    locals: Record<string, unknown>;
}

/** Response helper — extends native ServerResponse */
export interface Response extends ServerResponse {
    json: (data: unknown) => void;
    send: (data: unknown) => void;
    status: (code: number) => Response;
}

export type Handler = (req: Request, res: Response) => void | Promise<void>;

/** Middleware signature */
export type Middleware = (req: Request, res: Response, next: () => Promise<void>) => Promise<void> | void;

export type ErrorHandler = (err: unknown, req: Request, res: Response) => void | Promise<void>;

/**
 * One entry of an app's route table.
 * `handlers` holds the middleware followed by the route handler (when there is one).
 */
export interface Route {
    readonly method: string;
    readonly path: string;
    name: string;
    readonly group?: Group;
    readonly handlers: readonly Middleware[];
    readonly use: boolean;
}

/** Snapshot of a group handed to group hooks */
export interface GroupInfo {
    readonly name: string;
    readonly prefix: string;
}

export interface StaticOptions {
    /** file served for a directory, default "index.html" */
    index?: string;
    /** Cache-Control max-age in seconds, default 0 */
    maxAge?: number;
    download?: boolean;
}
