// The `input` package ships no type declarations
declare module 'input' {
  interface PromptOptions {
    default?: string;
  }

  const input: {
    text(message: string, options?: PromptOptions): Promise<string>;
    password(message: string, options?: PromptOptions): Promise<string>;
    confirm(
      message: string,
      options?: { default?: boolean },
    ): Promise<boolean>;
  };

  export = input;
}
