import { stderr, stdin } from 'node:process';
import { createInterface } from 'node:readline/promises';

export type Confirm = (question: string) => Promise<boolean>;

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

// Questions go to stderr so that stdout only carries command output.
const terminal: PromptStreams = { input: stdin, output: stderr };

export async function promptConfirm(
  question: string,
  defaultValue = false,
  streams: PromptStreams = terminal
): Promise<boolean> {
  const rl = createInterface(streams);
  try {
    const suffix = defaultValue ? '[Y/n]' : '[y/N]';
    const answer = (await rl.question(`${question} ${suffix}: `)).trim().toLowerCase();
    if (!answer) return defaultValue;
    return answer === 'y' || answer === 'yes';
  } finally {
    rl.close();
  }
}
