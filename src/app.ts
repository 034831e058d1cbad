import http from "http";
import { createConfig, freezeConfig, type AppConfig, type ConfigView } from "./config";
import { describeError, RouterSetupError } from "./errors";
import { Group, spawnGroup } from "./group";
import { Hooks } from "./hooks";
import { compose } from "./middleware";
import { getGroupPath, normalizePath } from "./path";
import { Registrar } from "./registrar";
import { RouteBuilder } from "./registering";
import { createRequest } from "./request";
import { createResponse } from "./response";
import { Router } from "./router";
import { serveStatic } from "./static";
import { resolveUseArgs, type UseArg } from "./use";
import { METHOD_USE, type Handler, type Middleware, type Request, type Response, type Route, type StaticOptions } from "./types";

/** An app mounted into another, with the path it was mounted at relative to that app */
export interface Mount {
    readonly path: string;
    readonly app: App;
}

const notFound: Middleware = (_req, res) => {
    if (!res.writableEnded) res.status(404).json({ error: "Not Found" });
};

/**
 * The application: owner of the route table, the hooks and the configuration that all of
 * its groups share. The app is itself a router with no group, so routes registered on it
 * directly have no group name.
 */
export class App extends Registrar {
    readonly hooks = new Hooks();
    private router = new Router();
    private stack: Route[] = [];
    // routes created by the last register() call; name() applies to these
    private latestRoutes: Route[] = [];
    private currentConfig: ConfigView;
    private mountPath = "";
    // apps mounted into this one, and the apps this one is mounted into
    private mounts: Mount[] = [];
    private mountedInto: Mount[] = [];
    private locked = false;
    private server?: http.Server;

    constructor(config: Partial<AppConfig> = {}) {
        super();
        this.currentConfig = freezeConfig(createConfig(config));
    }

    get config(): ConfigView {
        return this.currentConfig;
    }

    /** Merge and validate new settings. Later registrations see them immediately. */
    configure(patch: Partial<AppConfig>): this {
        this.currentConfig = freezeConfig(createConfig(patch, this.currentConfig));
        return this;
    }

    protected requestMethods(): readonly string[] {
        return this.currentConfig.requestMethods;
    }

    /**
     * Add one route per method. The middleware runs before the handler, in the given order;
     * without a handler the entry is middleware only. METHOD_USE registers middleware that
     * matches every method below `path`.
     */
    register(
        methods: readonly string[],
        path: string,
        group: Group | undefined,
        handler: Handler | undefined,
        ...middleware: Middleware[]
    ): void {
        const handlers: Middleware[] = handler ? [...middleware, handler] : [...middleware];
        const routes: Route[] = methods.map((raw) => {
            const method = raw.toUpperCase();
            const use = method === METHOD_USE;
            if (!use && !this.currentConfig.requestMethods.includes(method)) {
                throw new RouterSetupError(`add: invalid http method ${raw}`);
            }
            return { method, path: normalizePath(path), name: "", group, handlers, use };
        });
        this.commit(routes);
    }

    /** GET and HEAD on `path` and everything below it, served from `root` */
    registerStatic(path: string, root: string, options?: StaticOptions): void {
        const handlers = [serveStatic(root, options)];
        const routes: Route[] = [];
        for (const target of [normalizePath(path), getGroupPath(path, "*")]) {
            for (const method of ["GET", "HEAD"]) {
                routes.push({ method, path: target, name: "", group: undefined, handlers, use: false });
            }
        }
        this.commit(routes);
    }

    private commit(routes: Route[]) {
        for (const route of routes) {
            this.hooks.executeOnRouteHooks(route);
            this.stack.push(route);
            this.router.add(route);
            for (const parent of this.mountedInto) parent.app.attach(route, parent.path);
        }
        this.latestRoutes = routes;
    }

    /**
     * Name the routes of the latest registration. Routes of a named group get the group
     * name in front.
     */
    name(name: string): this {
        if (this.latestRoutes.length === 0) {
            throw new RouterSetupError(`name: no route registered to name "${name}"`);
        }
        for (const route of this.latestRoutes) {
            route.name = route.group ? route.group.getName() + name : name;
            this.hooks.executeOnNameHooks(route);
        }
        return this;
    }

    getRoute(name: string): Route | undefined {
        return this.stack.find((route) => route.name === name);
    }

    getRoutes(): readonly Route[] {
        return this.stack;
    }

    getMountPath(): string {
        return this.mountPath;
    }

    /**
     * Build the path of a named route.
     *
     *   app.url("user.show", { id: "42" }) // "/users/42"
     */
    url(name: string, params: Record<string, string> = {}): string {
        const route = this.getRoute(name);
        if (!route) throw new Error(`url: no route named "${name}"`);

        const segments = route.path.split("/").map((segment) => {
            if (segment === "*") return params["*"] ?? "";
            if (!segment.startsWith(":")) return segment;
            const value = params[segment.slice(1)];
            if (value === undefined) throw new Error(`url: missing param "${segment.slice(1)}" for route "${name}"`);
            return encodeURIComponent(value);
        });
        return normalizePath(segments.join("/"));
    }

    getMounts(): readonly Mount[] {
        return this.mounts;
    }

    /**
     * Serve every route of `subApp` under `prefix`, including routes registered on it
     * later. Names and groups are kept, and naming a route on `subApp` names its mounted
     * copy too. Requests reaching mounted routes are dispatched by this app, so this app's
     * error handler covers them.
     */
    mount(prefix: string, subApp: App): this {
        if (subApp === this || this.isMountedIn(subApp)) {
            throw new RouterSetupError("mount: an app cannot be mounted into itself");
        }
        const path = normalizePath(prefix);
        for (const route of subApp.getRoutes()) this.attach(route, path);

        this.mounts.push({ path, app: subApp });
        subApp.mountedInto.push({ path, app: this });
        subApp.setMountPath(getGroupPath(this.mountPath, path));
        this.hooks.executeOnMountHooks(subApp);
        return this;
    }

    private attach(source: Route, prefix: string) {
        const route = mountedRoute(source, getGroupPath(prefix, source.path));
        this.stack.push(route);
        this.router.add(route);
        for (const parent of this.mountedInto) parent.app.attach(route, parent.path);
    }

    private isMountedIn(app: App): boolean {
        return this.mountedInto.some((parent) => parent.app === app || parent.app.isMountedIn(app));
    }

    private setMountPath(path: string) {
        this.mountPath = path;
        for (const child of this.mounts) child.app.setMountPath(getGroupPath(path, child.path));
    }

    /**
     * Run `fn` holding the app-wide lock. The lock is not reentrant: calling back into it
     * from `fn`, e.g. naming a group from an onGroupName hook, throws.
     */
    withLock<T>(fn: () => T): T {
        if (this.locked) throw new RouterSetupError("app lock is already held");
        this.locked = true;
        try {
            return fn();
        } finally {
            this.locked = false;
        }
    }

    add(methods: readonly string[], path: string, handler: Handler, ...middleware: Middleware[]): this {
        this.register(methods, getGroupPath("/", path), undefined, handler, ...middleware);
        return this;
    }

    static(prefix: string, root: string, options?: StaticOptions): this {
        this.registerStatic(getGroupPath("/", prefix), root, options);
        return this;
    }

    /** Same arguments as Group.use, relative to the root */
    use(...args: UseArg[]): this {
        const { prefixes, subApp, handlers } = resolveUseArgs(args);
        for (const prefix of prefixes) {
            if (subApp) {
                this.mount(getGroupPath("/", prefix), subApp);
                break;
            }
            this.register([METHOD_USE], getGroupPath("/", prefix), undefined, undefined, ...handlers);
        }
        return this;
    }

    group(prefix: string, ...handlers: Middleware[]): Group {
        return spawnGroup(this, undefined, getGroupPath("/", prefix), handlers);
    }

    route(path: string): RouteBuilder {
        return new RouteBuilder(this, getGroupPath("/", path));
    }

    /** Node request listener dispatching to the registered routes */
    handler() {
        return async (raw: http.IncomingMessage, base: http.ServerResponse): Promise<void> => {
            const res = createResponse(base);
            const req = createRequest(raw);

            try {
                const match = this.router.lookup(req.method ?? "GET", req.path);
                req.params = match.params;
                await compose([...match.chain, notFound])(req, res);
            } catch (err) {
                await this.handleError(err, req, res);
            }
        };
    }

    private async handleError(err: unknown, req: Request, res: Response) {
        try {
            await this.currentConfig.errorHandler(err, req, res);
        } catch (handlerErr) {
            console.error("errorHandler failed:", describeError(handlerErr));
            if (!res.writableEnded) res.status(500).end();
        }
    }

    async listen(port: number, callback?: (server: http.Server) => void): Promise<http.Server> {
        const server = http.createServer(this.handler());
        await new Promise<void>((resolve, reject) => {
            server.once("error", reject);
            server.listen(port, () => {
                server.off("error", reject);
                resolve();
            });
        });
        this.server = server;
        await this.hooks.executeOnListenHooks({ port });
        callback?.(server);
        return server;
    }

    /** Graceful close (returns a Promise) */
    async close(): Promise<void> {
        // call shutdown hooks first
        await this.hooks.executeOnShutdownHooks();

        const server = this.server;
        if (!server) return;
        await new Promise<void>((resolve, reject) => {
            server.close((err) => {
                if (err) return reject(err);
                resolve();
            });
        });
        this.server = undefined;
    }
}

/** Copy of `source` at another path whose name stays in step with the source's */
function mountedRoute(source: Route, path: string): Route {
    return {
        method: source.method,
        path,
        get name() {
            return source.name;
        },
        set name(value: string) {
            source.name = value;
        },
        group: source.group,
        handlers: source.handlers,
        use: source.use,
    };
}
