import type { Middleware, Request, Response } from "./types";

/**
 * Compose middlewares into a single async function.
 * Each middleware must call next() to continue.
 *
 * - protects against multiple next() calls
 * - propagates errors (rejects) to caller so the app can handle them centrally
 */
export function compose(middlewares: readonly Middleware[]) {
    return async (req: Request, res: Response): Promise<void> => {
        let i = -1;
        const dispatch = async (index: number): Promise<void> => {
            if (index <= i) throw new Error("next() called multiple times");
            i = index;
            const fn = middlewares[index];
            if (!fn) return;
            await fn(req, res, () => dispatch(index + 1));
        };
        await dispatch(0);
    };
}
