import type { App } from "./app";
import { getGroupPath, normalizePath } from "./path";
import { Registrar } from "./registrar";
import { RouteBuilder } from "./registering";
import { resolveUseArgs, type UseArg } from "./use";
import { METHOD_USE, type GroupInfo, type Handler, type Middleware, type StaticOptions } from "./types";

/**
 * A sub-router rooted at a path prefix.
 *
 * Groups register straight into their app's route table; the group itself only keeps the
 * prefix, its name and whether anything was registered on it yet. `parent` is used for
 * building the group name and nothing else.
 *
 * Setup is expected to run in one place at startup. Apart from group naming, which holds
 * the app lock, calls on a group are not synchronized.
 *
 *   const api = app.group("/api").name("api.");
 *   api.get("/users", listUsers).name("users");    // route "api.users"
 *   const v1 = api.group("/v1", requireAuth);      // "/api/v1"
 */
export class Group extends Registrar {
    readonly prefix: string;
    private groupName = "";
    private anyRouteDefined = false;

    constructor(
        readonly app: App,
        prefix: string,
        readonly parent?: Group,
    ) {
        super();
        this.prefix = normalizePath(prefix);
    }

    getPrefix(): string {
        return this.prefix;
    }

    getName(): string {
        return this.groupName;
    }

    /** true once a route, middleware, static handler or mount was registered directly on this group */
    hasRoutes(): boolean {
        return this.anyRouteDefined;
    }

    info(): GroupInfo {
        return Object.freeze({ name: this.groupName, prefix: this.prefix });
    }

    /**
     * Name the group itself, or the latest route once anything was registered on the group.
     *
     * A group name is appended to the parent's name as is, so put the separator in the
     * names: parent "user." + "list" gives "user.list".
     */
    name(name: string): this {
        if (this.anyRouteDefined) {
            this.app.name(name);
            return this;
        }

        this.app.withLock(() => {
            this.groupName = this.parent ? this.parent.getName() + name : name;
            this.app.hooks.executeOnGroupNameHooks(this.info());
        });
        return this;
    }

    add(methods: readonly string[], path: string, handler: Handler, ...middleware: Middleware[]): this {
        this.app.register(methods, getGroupPath(this.prefix, path), this, handler, ...middleware);
        this.anyRouteDefined = true;
        return this;
    }

    protected requestMethods(): readonly string[] {
        return this.app.config.requestMethods;
    }

    static(prefix: string, root: string, options?: StaticOptions): this {
        this.app.registerStatic(getGroupPath(this.prefix, prefix), root, options);
        this.anyRouteDefined = true;
        return this;
    }

    /**
     * Register middleware for a prefix (or a list of prefixes) below this group,
     * or mount another app.
     *
     *   group.use(logger);
     *   group.use("/admin", requireAdmin);
     *   group.use(["/a", "/b"], audit);
     *   group.use("/billing", billingApp);
     *
     * Middleware matches every method. A call that mounts an app does nothing else:
     * only the first prefix is used and the handlers are not registered.
     */
    use(...args: UseArg[]): this {
        const { prefixes, subApp, handlers } = resolveUseArgs(args);

        for (const prefix of prefixes) {
            if (subApp) {
                this.app.mount(getGroupPath(this.prefix, prefix), subApp);
                break;
            }
            this.app.register([METHOD_USE], getGroupPath(this.prefix, prefix), this, undefined, ...handlers);
        }

        this.anyRouteDefined = true;
        return this;
    }

    /**
     * Create a nested group. Handlers given here become middleware for the whole
     * nested prefix and are registered on this group.
     */
    group(prefix: string, ...handlers: Middleware[]): Group {
        return spawnGroup(this.app, this, getGroupPath(this.prefix, prefix), handlers);
    }

    /** Builder for registering several methods on one path below this group */
    route(path: string): RouteBuilder {
        return new RouteBuilder(this.app, getGroupPath(this.prefix, path));
    }
}

/**
 * Register the group middleware (owned by `parent`), build the group and run the
 * onGroup hooks. A throwing hook aborts and the group is never handed out.
 */
export function spawnGroup(app: App, parent: Group | undefined, prefix: string, handlers: readonly Middleware[]): Group {
    if (handlers.length > 0) {
        app.register([METHOD_USE], prefix, parent, undefined, ...handlers);
    }

    const group = new Group(app, prefix, parent);
    app.hooks.executeOnGroupHooks(group.info());
    return group;
}
