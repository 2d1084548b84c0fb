export const TERMINAL = 'TERMINAL';

/** Line-oriented operator console. */
export interface Terminal {
  /** Resolves with the raw answer, or null once the operator closed the input. */
  ask(question: string): Promise<string | null>;
  print(line: string): void;
}
