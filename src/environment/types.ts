// ── Execution environment ────────────────────────────────────
// Everything the environment tools touch goes through this seam.
// Relative paths resolve against `cwd`.

export interface ExecutionEnvironment {
  readonly cwd: string;
  /** Throws ShellCommandError on a nonzero exit. */
  execute(command: string): Promise<string>;
  read(filePath: string): Promise<string>;
  writeRange(filePath: string, fromLine: number, toLine: number, content: string): Promise<string>;
  create(filePath: string, content: string): Promise<string>;
  append(filePath: string, content: string): Promise<string>;
  list(dirPath: string): Promise<string[]>;
  grep(filePath: string, pattern: string): Promise<string>;
}
