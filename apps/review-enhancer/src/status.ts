/** Sink for the human-readable progress lines the CLI prints. */
export type StatusReporter = Readonly<{
  line: (text?: string) => void;
}>;

export const stdoutReporter: StatusReporter = {
  line: (text = '') => {
    process.stdout.write(`${text}\n`);
  },
};
