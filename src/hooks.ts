import type { App } from "./app";
import { describeError, RouterSetupError } from "./errors";
import type { GroupInfo, Route } from "./types";

export type RouteHook = (route: Readonly<Route>) => void;
export type GroupHook = (group: GroupInfo) => void;
export type MountHook = (subApp: App) => void;
export type ListenHook = (info: { port: number }) => void | Promise<void>;
export type ShutdownHook = () => void | Promise<void>;

/**
 * Lifecycle hooks of an app.
 *
 * Setup hooks (onRoute, onName, onGroup, onGroupName, onMount) are synchronous and run in
 * registration order. A hook rejects by throwing; the first throw stops the chain and surfaces
 * as a RouterSetupError from the call that triggered it.
 *
 * onListen and onShutdown are awaited one after another. Their failures are logged so that one
 * broken hook does not keep the server from starting or stopping.
 */
export class Hooks {
    private routeHooks: RouteHook[] = [];
    private nameHooks: RouteHook[] = [];
    private groupHooks: GroupHook[] = [];
    private groupNameHooks: GroupHook[] = [];
    private mountHooks: MountHook[] = [];
    private listenHooks: ListenHook[] = [];
    private shutdownHooks: ShutdownHook[] = [];

    onRoute(...handlers: RouteHook[]): this {
        this.routeHooks.push(...handlers);
        return this;
    }

    onName(...handlers: RouteHook[]): this {
        this.nameHooks.push(...handlers);
        return this;
    }

    onGroup(...handlers: GroupHook[]): this {
        this.groupHooks.push(...handlers);
        return this;
    }

    onGroupName(...handlers: GroupHook[]): this {
        this.groupNameHooks.push(...handlers);
        return this;
    }

    onMount(...handlers: MountHook[]): this {
        this.mountHooks.push(...handlers);
        return this;
    }

    onListen(...handlers: ListenHook[]): this {
        this.listenHooks.push(...handlers);
        return this;
    }

    onShutdown(...handlers: ShutdownHook[]): this {
        this.shutdownHooks.push(...handlers);
        return this;
    }

    executeOnRouteHooks(route: Readonly<Route>): void {
        runSetupHooks("onRoute", this.routeHooks, route);
    }

    executeOnNameHooks(route: Readonly<Route>): void {
        runSetupHooks("onName", this.nameHooks, route);
    }

    executeOnGroupHooks(group: GroupInfo): void {
        runSetupHooks("onGroup", this.groupHooks, group);
    }

    executeOnGroupNameHooks(group: GroupInfo): void {
        runSetupHooks("onGroupName", this.groupNameHooks, group);
    }

    executeOnMountHooks(subApp: App): void {
        runSetupHooks("onMount", this.mountHooks, subApp);
    }

    async executeOnListenHooks(info: { port: number }): Promise<void> {
        for (const hook of this.listenHooks) {
            try {
                await hook(info);
            } catch (err) {
                console.error("onListen hook failed:", describeError(err));
            }
        }
    }

    async executeOnShutdownHooks(): Promise<void> {
        for (const hook of this.shutdownHooks) {
            try {
                await hook();
            } catch (err) {
                console.error("onShutdown hook failed:", describeError(err));
            }
        }
    }
}

function runSetupHooks<T>(kind: string, hooks: readonly ((value: T) => void)[], value: T): void {
    for (const hook of hooks) {
        try {
            hook(value);
        } catch (err) {
            throw new RouterSetupError(`${kind} hook failed: ${describeError(err)}`, { cause: err });
        }
    }
}
