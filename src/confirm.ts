import readline from "node:readline";

export type Confirm = (question: string) => Promise<boolean>;

export function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/** Ask a yes/no question on a terminal; a closed input counts as "no". */
export function confirmPrompt({
  input = process.stdin,
  output = process.stderr,
}: {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
} = {}): Confirm {
  return (question) =>
    new Promise<boolean>((resolve) => {
      const rl = readline.createInterface({ input, output });
      let answered = false;
      rl.on("close", () => {
        if (!answered) resolve(false);
      });
      rl.question(question, (answer) => {
        answered = true;
        rl.close();
        resolve(isYes(answer));
      });
    });
}
