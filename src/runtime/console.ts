export type OperatorConsole = {
  print: (lines: string[]) => void;
  ask: (question: string) => Promise<string>;
};

export const AFFIRMATIVE_ANSWERS: ReadonlySet<string> = new Set(["y", "yes", "是", "确认"]);

export const isAffirmative = (answer: string): boolean => AFFIRMATIVE_ANSWERS.has(answer.trim().toLowerCase());

export const confirmWith = async (console: OperatorConsole, question: string): Promise<boolean> =>
  isAffirmative(await console.ask(question));
