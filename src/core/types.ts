export type Delay = (milliseconds: number) => Promise<void>;

export type Logger = Readonly<{
  info: (msg: string, ...rest: unknown[]) => void;
  warn: (msg: string, ...rest: unknown[]) => void;
  error: (msg: string, ...rest: unknown[]) => void;
  debug: (msg: string, ...rest: unknown[]) => void;
}>;

// Runtime context carried into the client and the report run - fetch, clock, sleep and logging.
// Tests swap each of these for in-process stand-ins.
export type RunContext = Readonly<{
  fetch: typeof fetch;
  now: () => Date;
  delay: Delay;
  logger: Logger;
}>;

export const defaultDelay: Delay = (milliseconds: number) =>
  new Promise((resolve) => {
    setTimeout(resolve, milliseconds);
  });
