import * as readline from 'readline';
import { InvalidArgumentError, PromptClosedError } from './errors';

/**
 * Supplies the next line of input, or null once the input has ended
 */
export type AnswerReader = () => Promise<string | null>;

export interface StdinReader {
  read: AnswerReader;
  close: () => void;
}

export function createStdinReader(): StdinReader {
  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
  });
  const lines = rl[Symbol.asyncIterator]();

  return {
    read: async () => {
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close: () => rl.close(),
  };
}

/**
 * Replays a fixed list of answers, then reports end of input
 */
export function createScriptedReader(answers: string[]): AnswerReader {
  const queue = [...answers];
  return async () => {
    const next = queue.shift();
    return next === undefined ? null : next;
  };
}

function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === '';
}

/**
 * Builds the line shown to the user, e.g. `Delete context 'dev'? ( y | n* ) : `
 */
export function formatQuestion(question: string, answers: string[], defaultAnswer?: string): string {
  let full = question;
  if (answers.length > 0) {
    const options = answers.map((answer) => (answer === defaultAnswer ? `${answer}*` : answer));
    full += ` ( ${options.join(' | ')} )`;
  }
  return `${full} : `;
}

export class Prompter {
  constructor(private readonly reader: AnswerReader) {}

  /**
   * Asks until an acceptable answer comes back.
   * Blank input takes the default when there is one; with allowed answers the
   * input must match one of them exactly. Once input has ended the default is
   * taken, and a question without one fails.
   */
  async ask(question: string, allowedAnswers?: readonly string[], defaultAnswer?: string): Promise<string> {
    const answers = [...new Set(allowedAnswers ?? [])];
    const fallback = isBlank(defaultAnswer) ? undefined : defaultAnswer;

    if (answers.length > 0) {
      if (fallback !== undefined && !answers.includes(fallback)) {
        throw new InvalidArgumentError(`Default answer (${fallback}) is not in set of answers [${answers.join(', ')}]`);
      }
      if (answers.length < 2) {
        throw new InvalidArgumentError(`Need more answers than [${answers.join(', ')}]`);
      }
    }

    const fullQuestion = formatQuestion(question, answers, fallback);

    while (true) {
      console.log(fullQuestion);
      const input = await this.reader();

      if (input === null) {
        if (fallback !== undefined) {
          return fallback;
        }
        throw new PromptClosedError();
      }

      if (isBlank(input)) {
        if (fallback !== undefined) {
          return fallback;
        }
        continue;
      }

      if (answers.length === 0 || answers.includes(input)) {
        return input;
      }
      console.error(`'${input}' is not in [${answers.join(', ')}]`);
    }
  }

  async yesOrNo(question: string, defaultIsYes: boolean = true): Promise<boolean> {
    const answer = await this.ask(question, ['y', 'n'], defaultIsYes ? 'y' : 'n');
    return answer === 'y';
  }
}
