// packages/core/src/utils/text.ts

/** Last `count` lines of `text`, trailing newline stripped. */
export function tailLines(text: string, count: number): string {
  const lines = text.replace(/\r?\n$/, '').split(/\r?\n/);
  return lines.slice(-count).join('\n');
}
