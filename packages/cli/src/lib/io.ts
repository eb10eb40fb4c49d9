/**
 * Process I/O for the CLI: tool arguments come from stdin or a file, output goes
 * to the process streams
 */

import { readFile } from "node:fs/promises";
import type { Readable } from "node:stream";
import { parseJson } from "./arg.js";
import { CliError } from "./errors.js";

export const MAX_STDIN_BYTES = 10 * 1024 * 1024;

/**
 * Collect piped input as UTF-8 text
 * @throws CliError once the input grows past `maxBytes`
 */
export async function readStdin(input: Readable = process.stdin, maxBytes = MAX_STDIN_BYTES): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of input) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf8");
    size += buf.length;
    if (size > maxBytes) {
      input.destroy();
      throw new CliError(`stdin exceeds ${maxBytes} bytes`);
    }
    chunks.push(buf);
  }

  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Read tool arguments from a JSON file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (err) {
    throw new CliError(`Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  return parseJson(content, `file ${filePath}`);
}

export function writeStdout(content: string): void {
  process.stdout.write(content);
}

export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/** True when nothing is piped in */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}
