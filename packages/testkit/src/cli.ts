/**
 * CLI testing utilities
 *
 * The CLI writes through injected writers, so tests run commands in-process and
 * collect what would have gone to stdout/stderr.
 */

export interface OutputCapture {
  /** Writer to hand to the CLI */
  write: (chunk: string) => void;
  /** Everything written so far */
  text(): string;
  /** Written output split into non-empty lines */
  lines(): string[];
  /** Parse the whole output as JSON */
  json<T = unknown>(): T;
}

export function captureOutput(): OutputCapture {
  const chunks: string[] = [];
  return {
    write: (chunk) => {
      chunks.push(chunk);
    },
    text: () => chunks.join(""),
    lines: () =>
      chunks
        .join("")
        .split("\n")
        .filter((line) => line.length > 0),
    json: <T = unknown>(): T => JSON.parse(chunks.join("").trim()),
  };
}
