/**
 * Confirmation gates for destructive operations
 */

export interface ConfirmationRequest {
  message: string;
  /** Exact text the operator has to type */
  requiredPhrase: string;
  /** Resources the operation will destroy */
  items?: string[];
}

export interface ConfirmationGate {
  confirm(request: ConfirmationRequest): Promise<boolean>;
}

/**
 * Phrases a destroy run asks for, in order
 */
export function destroyPhrases(environment: string): string[] {
  return environment === 'prod' ? ['DELETE PRODUCTION', 'yes'] : ['DELETE', 'yes'];
}

/**
 * Asks one question and resolves with the typed answer
 */
export type PhrasePrompt = (message: string) => Promise<string>;

/**
 * Text prompt on the given stream. inquirer loads on first use, so runs
 * that never prompt never load it.
 */
export function inquirerPrompt(output: NodeJS.WriteStream = process.stderr): PhrasePrompt {
  return async (message) => {
    const inquirer = await import('inquirer');
    const prompt = inquirer.default.createPromptModule({ output });
    const { phrase } = await prompt<{ phrase: string }>([{ type: 'input', name: 'phrase', message }]);
    return phrase;
  };
}

/**
 * Prompts on the terminal. Prompts go to stderr so stdout only carries the
 * run report.
 */
export class InteractiveConfirmationGate implements ConfirmationGate {
  constructor(private readonly ask: PhrasePrompt = inquirerPrompt()) {}

  async confirm(request: ConfirmationRequest): Promise<boolean> {
    const message = [
      request.message,
      ...(request.items ?? []).map((item) => `  - ${item}`),
      `Type '${request.requiredPhrase}' to continue:`,
    ].join('\n');
    const answer = await this.ask(message);
    return answer.trim() === request.requiredPhrase;
  }
}

export interface PolicyConfirmationOptions {
  /** Approve every request (deploy --yes) */
  approveAll?: boolean;
  /** Phrases supplied up front (destroy --confirm) */
  phrases?: string[];
}

/**
 * Non-interactive gate for CI: a request is approved when its phrase was
 * supplied up front
 */
export class PolicyConfirmationGate implements ConfirmationGate {
  readonly requests: ConfirmationRequest[] = [];

  constructor(private readonly options: PolicyConfirmationOptions = {}) {}

  async confirm(request: ConfirmationRequest): Promise<boolean> {
    this.requests.push(request);
    if (this.options.approveAll) {
      return true;
    }
    return (this.options.phrases ?? []).includes(request.requiredPhrase);
  }
}
