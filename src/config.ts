import { z } from "zod";
import { describeError, RouterSetupError } from "./errors";
import { DEFAULT_METHODS, type ErrorHandler } from "./types";

const configSchema = z.object({
    requestMethods: z
        .array(z.string().regex(/^[A-Z]+$/, "method tokens must be upper-case letters"))
        .min(1, "at least one request method is required"),
    errorHandler: z.custom<ErrorHandler>((value) => typeof value === "function", {
        message: "errorHandler must be a function",
    }),
});

export type AppConfig = z.infer<typeof configSchema>;

/** Read-only view of a validated config, as handed out by `App.config` */
export type ConfigView = Readonly<Omit<AppConfig, "requestMethods">> & { readonly requestMethods: readonly string[] };

export const defaultErrorHandler: ErrorHandler = (err, _req, res) => {
    if (res.headersSent) {
        res.end();
        return;
    }
    res.status(500).json({ error: describeError(err) || "Internal Server Error" });
};

/** Merge `patch` over `base` (or the defaults) and validate the result */
export function createConfig(patch: Partial<AppConfig> = {}, base?: ConfigView): AppConfig {
    const merged = {
        requestMethods: [...DEFAULT_METHODS],
        errorHandler: defaultErrorHandler,
        ...base,
        ...patch,
    };
    const parsed = configSchema.safeParse(merged);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
            .join("; ");
        throw new RouterSetupError(`invalid config: ${issues}`);
    }
    return parsed.data;
}

export function freezeConfig(config: AppConfig): ConfigView {
    return Object.freeze({ ...config, requestMethods: Object.freeze([...config.requestMethods]) });
}
