import type { Handler, Middleware } from "./types";

/**
 * Verb surface shared by the app and its groups. Every verb funnels into add().
 */
export abstract class Registrar {
    abstract add(methods: readonly string[], path: string, handler: Handler, ...middleware: Middleware[]): this;

    /** the app's configured method list, read at call time */
    protected abstract requestMethods(): readonly string[];

    get(path: string, handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["GET"], path, handler, ...middleware);
    }

    head(path: string, handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["HEAD"], path, handler, ...middleware);
    }

    post(path: string, handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["POST"], path, handler, ...middleware);
    }

    put(path: string, handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["PUT"], path, handler, ...middleware);
    }

    delete(path: string, handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["DELETE"], path, handler, ...middleware);
    }

    connect(path: string, handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["CONNECT"], path, handler, ...middleware);
    }

    options(path: string, handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["OPTIONS"], path, handler, ...middleware);
    }

    trace(path: string, handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["TRACE"], path, handler, ...middleware);
    }

    patch(path: string, handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["PATCH"], path, handler, ...middleware);
    }

    /** Register the handler for every method the app is configured with */
    all(path: string, handler: Handler, ...middleware: Middleware[]): this {
        return this.add(this.requestMethods(), path, handler, ...middleware);
    }
}
