import { cancel, confirm, isCancel, note, password, text } from "@clack/prompts";

import { stylePromptMessage, stylePromptTitle } from "../terminal/prompt-style.js";
import type { Prompter } from "./prompts.js";
import { PromptCancelledError } from "./prompts.js";

function guardCancel<T>(value: T | symbol): T {
  if (isCancel(value)) {
    cancel(stylePromptTitle("Cancelled.") ?? "Cancelled.");
    throw new PromptCancelledError();
  }
  return value;
}

export function createClackPrompter(): Prompter {
  return {
    note: async (message, title) => {
      note(message, stylePromptTitle(title));
    },
    text: async (params) =>
      guardCancel(
        await text({
          message: stylePromptMessage(params.message),
          initialValue: params.initialValue,
          placeholder: params.placeholder,
          validate: params.validate,
        }),
      ),
    password: async (params) =>
      guardCancel(
        await password({
          message: stylePromptMessage(params.message),
          validate: params.validate,
        }),
      ),
    confirm: async (params) =>
      guardCancel(
        await confirm({
          message: stylePromptMessage(params.message),
          initialValue: params.initialValue,
        }),
      ),
  };
}
