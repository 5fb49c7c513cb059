import { Readable } from "stream";

export async function streamToString(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  return new Promise<string>((resolve, reject) => {
    stream.on("data", (chunk: Buffer | string) => {
      chunks.push(Buffer.from(chunk));
    });
    stream.on("error", (error: Error) => reject(error));
    stream.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
  });
}

/**
 * Wraps an in-memory payload in a single-chunk Readable.
 */
export function toReadable(content: string | Buffer | Uint8Array): Readable {
  return Readable.from([Buffer.from(content)]);
}

export function isReadable(value: unknown): value is Readable {
  return value instanceof Readable;
}
