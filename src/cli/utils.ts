/**
 * Shared CLI utilities: flag parsing and output helpers.
 */

/**
 * Print a usage error and exit with code 2.
 */
export function usageError(message: string, usage: string): never {
  console.error(`Error: ${message}`);
  console.log(`Usage: ${usage}`);
  process.exit(2);
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

/**
 * Value following `name`, or undefined when the flag is absent or last.
 */
export function flagValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index < 0 || index + 1 >= args.length) return undefined;
  return args[index + 1];
}

/**
 * Arguments that are neither flags nor the values of `valueFlags`.
 */
export function positionals(args: string[], valueFlags: string[] = []): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valueFlags.includes(arg)) {
      i++;
    } else if (!arg.startsWith('--')) {
      out.push(arg);
    }
  }
  return out;
}

/**
 * Parse an integer flag such as `--k 3`. Returns `fallback` when absent, null when invalid.
 */
export function positiveIntFlag(args: string[], name: string, fallback: number): number | null {
  const raw = flagValue(args, name);
  if (raw === undefined) {
    return hasFlag(args, name) ? null : fallback;
  }
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : null;
}

/**
 * Collapse whitespace and truncate at a word boundary so the result fits `width`.
 */
export function shorten(text: string, width: number, placeholder: string = ' …'): string {
  const collapsed = text.split(/\s+/).filter(Boolean).join(' ');
  if (collapsed.length <= width) return collapsed;

  let line = '';
  for (const word of collapsed.split(' ')) {
    const next = line ? `${line} ${word}` : word;
    if (next.length + placeholder.length > width) break;
    line = next;
  }
  return line ? `${line}${placeholder}` : placeholder.trim();
}

/**
 * Two display lines for a retrieved chunk: scores and source, then a text preview.
 */
export function formatChunk(
  index: number,
  chunk: { score: number; tokens: number; text: string; source: { url: string } },
  width: number,
): [string, string] {
  return [
    `${String(index).padStart(2)}. score=${chunk.score.toFixed(4)}  tokens=${String(chunk.tokens).padStart(3)}  url=${chunk.source.url}`,
    `    ${shorten(chunk.text, width)}`,
  ];
}
