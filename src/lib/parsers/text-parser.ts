import { createInterface } from 'readline';
import { Readable } from 'stream';

/**
 * Yield the lines of a text stream without their line terminators.
 * A stream abandoned before its end is destroyed; one read to the end is
 * left open so the producer can still report how it finished.
 *
 * @param stream - Node.js Readable stream
 * @returns AsyncGenerator that yields text lines
 */
export async function* streamTextLines(
  stream: NodeJS.ReadableStream
): AsyncGenerator<string, void, unknown> {
  const rl = createInterface({
    input: stream,
    terminal: false,
    crlfDelay: Infinity, // Handles both \n and \r\n
  });

  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
    if (stream instanceof Readable && !stream.readableEnded) {
      stream.destroy();
    }
  }
}

/**
 * Drain a text stream into an array of lines
 */
export async function collectTextLines(stream: NodeJS.ReadableStream): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of streamTextLines(stream)) {
    lines.push(line);
  }
  return lines;
}
