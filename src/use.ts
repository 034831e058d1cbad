import { App } from "./app";
import { RouterSetupError } from "./errors";
import type { Middleware } from "./types";

/**
 * What use() accepts: a path prefix, a list of prefixes sharing the same middleware,
 * a middleware, or an app to mount.
 */
export type UseArg = string | string[] | Middleware | App;

export interface ResolvedUse {
    prefixes: string[];
    subApp?: App;
    handlers: Middleware[];
}

/**
 * Sort use() arguments into prefixes, sub-app and handlers.
 * The last string or list wins; handlers keep their order.
 */
export function resolveUseArgs(args: readonly UseArg[]): ResolvedUse {
    let prefix = "";
    let prefixes: string[] = [];
    let subApp: App | undefined;
    const handlers: Middleware[] = [];

    for (const arg of args) {
        if (typeof arg === "string") {
            prefix = arg;
        } else if (Array.isArray(arg)) {
            const invalid = arg.findIndex((p) => typeof p !== "string");
            if (invalid >= 0) throw new RouterSetupError(`use: invalid prefix ${describeType(arg[invalid])} in prefix list`);
            prefixes = arg;
        } else if (typeof arg === "function") {
            handlers.push(arg);
        } else if (arg instanceof App) {
            subApp = arg;
        } else {
            const unexpected: never = arg;
            throw new RouterSetupError(`use: invalid handler ${describeType(unexpected)}`);
        }
    }

    return {
        prefixes: prefixes.length > 0 ? [...prefixes] : [prefix],
        subApp,
        handlers,
    };
}

function describeType(value: unknown): string {
    if (typeof value !== "object") return typeof value;
    return Object.prototype.toString.call(value).slice(8, -1);
}
