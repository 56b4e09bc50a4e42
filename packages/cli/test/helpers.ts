import { PassThrough, Writable } from "node:stream";

/**
 * In-process stand-ins for stdin/stdout. Writes are captured synchronously.
 */
export function createTestIo() {
  const input = new PassThrough();
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return {
    input,
    output,
    text: () => chunks.join(""),
  };
}
