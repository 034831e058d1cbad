import type { Middleware, Route } from "./types";

/**
 * Node of the Radix Tree
 */
class RadixNode {
    segment: string;
    children: Map<string, RadixNode> = new Map();
    paramChild: RadixNode | null = null;
    wildcardChild: RadixNode | null = null;
    paramName: string;
    route?: Route;

    constructor(segment: string) {
        this.segment = segment;
        this.paramName = segment.startsWith(":") ? segment.slice(1) : "";
    }
}

export interface RouteMatch {
    /** undefined when only middleware layers matched */
    route?: Route;
    /** params captured by matching layers, overridden by the route's own */
    params: Record<string, string>;
    /** matching USE layers in registration order, then the route's own handlers */
    chain: Middleware[];
}

interface Layer {
    route: Route;
    segments: string[];
}

/**
 * One radix tree per request method, plus the ordered list of USE layers.
 * A USE layer matches its prefix and every path below it; `:param` and `*` segments
 * in a layer prefix match the same way they do in a route.
 */
export class Router {
    private trees = new Map<string, RadixNode>();
    private layers: Layer[] = [];

    add(route: Route) {
        if (route.use) {
            this.layers.push({ route, segments: splitPath(route.path) });
            return;
        }

        let node = this.trees.get(route.method);
        if (!node) {
            node = new RadixNode("");
            this.trees.set(route.method, node);
        }

        for (const segment of splitPath(route.path)) {
            if (segment === "*") {
                if (!node.wildcardChild) node.wildcardChild = new RadixNode(segment);
                node = node.wildcardChild;
                // everything after * belongs to the wildcard
                break;
            }
            if (segment.startsWith(":")) {
                if (!node.paramChild) node.paramChild = new RadixNode(segment);
                node = node.paramChild;
                continue;
            }
            let child = node.children.get(segment);
            if (!child) {
                child = new RadixNode(segment);
                node.children.set(segment, child);
            }
            node = child;
        }

        node.route = route;
    }

    /**
     * Match a percent-encoded request path. A path that does not decode matches nothing.
     */
    lookup(method: string, path: string): RouteMatch {
        const segments = decodeSegments(path);
        if (!segments) return { params: {}, chain: [] };

        const params: Record<string, string> = {};
        const chain: Middleware[] = [];
        for (const layer of this.layers) {
            if (matchLayer(layer.segments, segments, params)) chain.push(...layer.route.handlers);
        }

        const found = this.find(method, segments);
        if (!found) return { params, chain };
        chain.push(...found.route.handlers);
        return { route: found.route, params: { ...params, ...found.params }, chain };
    }

    private find(method: string, segments: string[]): { route: Route; params: Record<string, string> } | null {
        let node = this.trees.get(method);
        if (!node) return null;
        const params: Record<string, string> = {};

        for (let i = 0; i < segments.length; i++) {
            const segment = segments[i];
            const child: RadixNode | undefined = node.children.get(segment);
            if (child) {
                node = child;
            } else if (node.paramChild) {
                params[node.paramChild.paramName] = segment;
                node = node.paramChild;
            } else if (node.wildcardChild) {
                params["*"] = segments.slice(i).join("/");
                node = node.wildcardChild;
                break;
            } else {
                return null;
            }
        }

        if (!node.route) return null;
        return { route: node.route, params };
    }
}

function splitPath(path: string) {
    return path.split("/").filter(Boolean);
}

function decodeSegments(path: string): string[] | null {
    try {
        return splitPath(path).map((p) => decodeURIComponent(p));
    } catch (err) {
        if (err instanceof URIError) return null;
        throw err;
    }
}

/** Prefix match of a layer against decoded path segments; captures into `params` on success */
function matchLayer(prefix: readonly string[], segments: readonly string[], params: Record<string, string>): boolean {
    const captured: Record<string, string> = {};
    for (let i = 0; i < prefix.length; i++) {
        const part = prefix[i];
        if (part === "*") {
            captured["*"] = segments.slice(i).join("/");
            break;
        }
        const segment = segments[i];
        if (segment === undefined) return false;
        if (part.startsWith(":")) captured[part.slice(1)] = segment;
        else if (part !== segment) return false;
    }
    Object.assign(params, captured);
    return true;
}
