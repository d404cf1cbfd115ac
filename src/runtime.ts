/**
 * Output and exit seam for CLI commands. Tests pass their own.
 */
export type RuntimeEnv = {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  exit: (code: number) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (...args) => console.log(...args),
  error: (...args) => console.error(...args),
  exit: (code) => {
    process.exit(code);
  },
};
