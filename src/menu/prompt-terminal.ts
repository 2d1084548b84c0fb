import { Inject, Injectable, Optional } from '@nestjs/common';
import prompts from 'prompts';
import { Readable, Writable } from 'stream';
import { Terminal } from './terminal';

export const TERMINAL_STREAMS = 'TERMINAL_STREAMS';

export interface TerminalStreams {
  stdin: Readable;
  stdout: Writable;
}

@Injectable()
export class PromptTerminal implements Terminal {
  private readonly streams: TerminalStreams;

  constructor(
    @Optional()
    @Inject(TERMINAL_STREAMS)
    streams?: TerminalStreams,
  ) {
    this.streams = streams ?? { stdin: process.stdin, stdout: process.stdout };
  }

  async ask(question: string): Promise<string | null> {
    const { stdin, stdout } = this.streams;
    if (stdin.readableEnded) {
      return null;
    }

    // prompts never settles once its input is gone, so race it against the end of stdin
    let onEnd: () => void = () => undefined;
    const inputEnded = new Promise<null>((resolve) => {
      onEnd = () => resolve(null);
      stdin.once('end', onEnd);
      stdin.once('close', onEnd);
    });

    const answered = prompts(
      { type: 'text', name: 'value', message: question, stdin, stdout },
      // Ctrl+C ends the answer chain without a value
      { onCancel: () => false },
    ).then((answer): string | null => {
      const value: unknown = answer.value;
      return typeof value === 'string' ? value : null;
    });

    try {
      return await Promise.race([answered, inputEnded]);
    } finally {
      stdin.removeListener('end', onEnd);
      stdin.removeListener('close', onEnd);
    }
  }

  print(line: string): void {
    console.log(line);
  }
}
