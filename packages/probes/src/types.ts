/** Function that executes a command and returns stdout */
export type ExecFn = (command: string, args: string[]) => Promise<string>;

/** Function that reads a text file, injected so probes can be tested off-host */
export type ReadFileFn = (path: string) => Promise<string>;
