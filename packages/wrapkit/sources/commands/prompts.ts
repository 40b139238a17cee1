import Enquirer from "enquirer";

import { getLogger } from "../log.js";

const logger = getLogger("commands.prompts");

export type PromptChoice<TValue extends string> = {
    value: TValue;
    name: string;
    description?: string;
};

export type PromptSelectConfig<TValue extends string> = {
    message: string;
    choices: Array<PromptChoice<TValue>>;
    /** Cancels the prompt and resolves null when no answer arrives in time. */
    timeoutMs?: number;
};

type PromptResult<TValue> = {
    value: TValue;
};

type Cancellable = {
    cancel: () => unknown;
};

const CANCEL_ERROR_NAMES = new Set(["CancelError", "ExitPromptError", "AbortError"]);

function isPromptCancelled(error: unknown): boolean {
    return error instanceof Error && CANCEL_ERROR_NAMES.has(error.name);
}

function isCancellable(value: unknown): value is Cancellable {
    return typeof value === "object" && value !== null && "cancel" in value && typeof value.cancel === "function";
}

async function runPrompt<TValue>(config: Record<string, unknown>, timeoutMs?: number): Promise<TValue | null> {
    const enquirer = new Enquirer<PromptResult<TValue>>();
    let active: Cancellable | null = null;
    let timedOut = false;
    enquirer.on("prompt", (instance: unknown) => {
        if (isCancellable(instance)) {
            active = instance;
        }
    });
    const timer =
        timeoutMs === undefined
            ? null
            : setTimeout(() => {
                  timedOut = true;
                  if (active) {
                      Promise.resolve(active.cancel()).catch((error: unknown) => {
                          logger.debug({ error }, "prompt cancel failed");
                      });
                  }
              }, timeoutMs);
    try {
        const result = await enquirer.prompt(config as never);
        if (!result || !Object.prototype.hasOwnProperty.call(result, "value")) {
            return null;
        }
        return result.value ?? null;
    } catch (error) {
        if (timedOut || isPromptCancelled(error)) {
            return null;
        }
        throw error;
    } finally {
        if (timer) {
            clearTimeout(timer);
        }
    }
}

export async function promptSelect<TValue extends string>(config: PromptSelectConfig<TValue>): Promise<TValue | null> {
    return runPrompt<TValue>(
        {
            type: "select",
            name: "value",
            message: config.message,
            choices: config.choices.map((choice) => ({
                name: choice.value,
                message: choice.name,
                value: choice.value,
                hint: choice.description
            }))
        },
        config.timeoutMs
    );
}
