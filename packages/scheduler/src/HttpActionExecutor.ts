import { ParlorError, errorMessage, type Logger } from "@parlor/core";
import type { ActionContext, ActionExecutor, OwnerProfile } from "./types";

export type HttpActionExecutorOptions = {
    url: string;
    buildBody: (profile: OwnerProfile, context: ActionContext) => unknown;
    timeoutMs?: number; // default 15000
    headers?: Record<string, string>;
    fetch?: typeof fetch;
    logger?: Logger;
};

/**
 * POSTs a JSON body built from the owner's profile. Any non-2xx response or
 * transport error surfaces as `EXECUTOR_FAILED`.
 */
export class HttpActionExecutor implements ActionExecutor {
    private readonly fetchImpl: typeof fetch;

    constructor(private readonly options: HttpActionExecutorOptions) {
        this.fetchImpl = options.fetch ?? globalThis.fetch;
    }

    async execute(profile: OwnerProfile, context: ActionContext): Promise<void> {
        const body = JSON.stringify(this.options.buildBody(profile, context));

        let response: Response;
        try {
            response = await this.fetchImpl(this.options.url, {
                method: "POST",
                headers: { "content-type": "application/json", ...this.options.headers },
                body,
                signal: AbortSignal.timeout(this.options.timeoutMs ?? 15_000),
            });
        } catch (error) {
            throw new ParlorError("EXECUTOR_FAILED", `Request failed: ${errorMessage(error)}`, error, {
                owner: context.owner,
            });
        }

        if (!response.ok) {
            const text = await response.text().catch(() => "");
            this.options.logger?.warn("Action endpoint rejected the request.", {
                owner: context.owner,
                status: response.status,
            });
            throw new ParlorError("EXECUTOR_FAILED", `Request failed with status ${response.status}: ${text}`, undefined, {
                owner: context.owner,
                status: response.status,
                body: text,
            });
        }
    }
}
