// Main public API of framework

// Core
export { App } from "./app";
export type { Mount } from "./app";
export { Group } from "./group";
export { RouteBuilder } from "./registering";
export { Router } from "./router";
export type { RouteMatch } from "./router";
export { Hooks } from "./hooks";
export type { RouteHook, GroupHook, MountHook, ListenHook, ShutdownHook } from "./hooks";

// Paths, config and errors
export { getGroupPath, normalizePath } from "./path";
export { createConfig, defaultErrorHandler, freezeConfig } from "./config";
export type { AppConfig, ConfigView } from "./config";
export { RouterSetupError } from "./errors";
export type { UseArg } from "./use";

// Middleware tools
export { compose } from "./middleware";
export { serveStatic } from "./static";

// Request/Response utils
export { createResponse } from "./response";
export { createRequest, parseQuery } from "./request";

// Types (all public types are exported here)
export * from "./types";
