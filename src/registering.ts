import type { App } from "./app";
import { getGroupPath } from "./path";
import type { Handler, Middleware } from "./types";

/**
 * Registers several methods on one fixed path.
 *
 *   app.route("/users/:id")
 *       .get(showUser)
 *       .put(updateUser)
 *       .delete(removeUser);
 *
 * Routes registered here belong to no group.
 */
export class RouteBuilder {
    constructor(
        private readonly app: App,
        readonly path: string,
    ) {}

    add(methods: readonly string[], handler: Handler, ...middleware: Middleware[]): this {
        this.app.register(methods, this.path, undefined, handler, ...middleware);
        return this;
    }

    get(handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["GET"], handler, ...middleware);
    }

    head(handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["HEAD"], handler, ...middleware);
    }

    post(handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["POST"], handler, ...middleware);
    }

    put(handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["PUT"], handler, ...middleware);
    }

    delete(handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["DELETE"], handler, ...middleware);
    }

    connect(handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["CONNECT"], handler, ...middleware);
    }

    options(handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["OPTIONS"], handler, ...middleware);
    }

    trace(handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["TRACE"], handler, ...middleware);
    }

    patch(handler: Handler, ...middleware: Middleware[]): this {
        return this.add(["PATCH"], handler, ...middleware);
    }

    all(handler: Handler, ...middleware: Middleware[]): this {
        return this.add(this.app.config.requestMethods, handler, ...middleware);
    }

    route(path: string): RouteBuilder {
        return new RouteBuilder(this.app, getGroupPath(this.path, path));
    }

    name(name: string): this {
        this.app.name(name);
        return this;
    }
}
