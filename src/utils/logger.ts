/**
 * Live execution logger for stepcheck.
 *
 * All output goes to stderr so stdout stays clean for JSON contract output.
 * Emoji prefixes give instant visual context in the terminal.
 */

let verbose = false;

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

/** Enable browser console / network chatter. */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function debug(message: string): void {
  if (verbose) write(`   · ${message}`);
}

export function step(index: number, total: number, description: string): void {
  write(`📋 [${String(index + 1)}/${String(total)}] ${description}`);
}

export function stepResult(
  index: number,
  total: number,
  success: boolean,
  description: string,
): void {
  const icon = success ? '✅' : '❌';
  write(`${icon} [${String(index + 1)}/${String(total)}] ${description}`);
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

export function nav(message: string): void {
  write(`🌐 ${message}`);
}

export function llm(message: string): void {
  write(`🧠 ${message}`);
}

export function verdict(result: string, reason: string): void {
  const icon = result === 'Pass' ? '🟢' : result === 'Fail' ? '🔴' : '🟠';
  write(`${icon} ${result}: ${reason}`);
}
