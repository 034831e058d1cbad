/**
 * Thrown when routes, groups or hooks are set up incorrectly.
 * These are bugs in the setup code, so they are never retried: let them abort startup
 * or catch them around app construction to report them.
 */
export class RouterSetupError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "RouterSetupError";
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
