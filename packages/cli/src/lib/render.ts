/**
 * Output rendering helpers
 */

export type Writer = (chunk: string) => void;

type Color = "red" | "green" | "yellow";

/**
 * Print JSON, pretty unless raw
 */
export function printJson(data: unknown, write: Writer, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  write(json + "\n");
}

/**
 * Print lines (one per line)
 */
export function printLines(lines: string[], write: Writer): void {
  lines.forEach((line) => write(line + "\n"));
}

/**
 * Apply ANSI color only when the target is a TTY
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  if (!isTTY) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
