import { PassThrough } from 'node:stream';

/**
 * In-memory destination for logger output.
 */
export function captureStream(): { stream: PassThrough; lines: () => string[] } {
  const stream = new PassThrough();
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf-8')));
  return {
    stream,
    lines: () =>
      chunks
        .join('')
        .split(/\r?\n/)
        .filter((line) => line.length > 0),
  };
}

/**
 * Gives winston's piped transports time to write.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 50));
}
