/**
 * Live execution logger for steploop.
 *
 * All output goes to stderr so stdout stays clean for the run result.
 * Emoji prefixes give instant visual context in the terminal.
 */

// ── Sink ────────────────────────────────────────────────────

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

let sink: LogSink = stderrSink;

/**
 * Redirect log lines (tests capture them, `--quiet` drops them).
 * Passing nothing restores stderr.
 */
export function setLogSink(next?: LogSink): void {
  sink = next ?? stderrSink;
}

function write(message: string): void {
  sink(message);
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function step(index: number, total: number, description: string): void {
  write(`📋 [${String(index + 1)}/${String(total)}] ${description}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function llm(message: string): void {
  write(`🧠 ${message}`);
}

export function tool(name: string, argNames: readonly string[]): void {
  const args = argNames.length > 0 ? argNames.join(', ') : 'no arguments';
  write(`🔧 ${name} (${args})`);
}

export function observation(success: boolean, text: string): void {
  const icon = success ? '✅' : '❌';
  const firstLine = text.split('\n', 1)[0] ?? '';
  const preview = firstLine.length > 100 ? `${firstLine.slice(0, 100)}...` : firstLine;
  write(`${icon} ${preview}`);
}

export function finished(result: string): void {
  write(`🏁 ${result}`);
}
