export type PromptTextParams = {
  message: string;
  initialValue?: string;
  placeholder?: string;
  validate?: (value: string) => string | undefined;
};

export type PromptPasswordParams = {
  message: string;
  validate?: (value: string) => string | undefined;
};

export type PromptConfirmParams = {
  message: string;
  initialValue?: boolean;
};

export type Prompter = {
  note: (message: string, title?: string) => Promise<void>;
  text: (params: PromptTextParams) => Promise<string>;
  password: (params: PromptPasswordParams) => Promise<string>;
  confirm: (params: PromptConfirmParams) => Promise<boolean>;
};

export class PromptCancelledError extends Error {
  constructor(message = "prompt cancelled") {
    super(message);
    this.name = "PromptCancelledError";
  }
}
