import { describe, test, expect } from "vitest";
import { InlineProgressLogger } from "./loggers";

/** In-memory stand-in for process.stderr */
function createStream(isTTY: boolean) {
  const chunks: string[] = [];
  const stream = {
    isTTY,
    write(chunk: string): boolean {
      chunks.push(chunk);
      return true;
    },
  };
  return { chunks, stream };
}

describe("InlineProgressLogger", () => {
  test("clears progress before a message", () => {
    const { chunks, stream } = createStream(true);
    const logger = new InlineProgressLogger({ stream });

    logger.progress("[1/2] sniffing");
    logger.info("done");

    expect(chunks).toEqual([
      "\r[1/2] sniffing",
      "\r" + " ".repeat(14) + "\r",
      "done\n",
    ]);
  });

  test("pads over a longer previous progress line", () => {
    const { chunks, stream } = createStream(true);
    const logger = new InlineProgressLogger({ stream });

    logger.progress("abcdef");
    logger.progress("abc");

    expect(chunks[1]).toBe("\rabc   ");
  });

  test("drops progress when not a TTY", () => {
    const { chunks, stream } = createStream(false);
    const logger = new InlineProgressLogger({ stream });

    logger.progress("[1/2] sniffing");
    logger.warn("careful");

    expect(chunks).toEqual(["warning: careful\n"]);
  });

  test("debug only in verbose mode", () => {
    const quiet = createStream(false);
    new InlineProgressLogger({ stream: quiet.stream }).debug("hidden");
    expect(quiet.chunks).toEqual([]);

    const verbose = createStream(false);
    new InlineProgressLogger({ stream: verbose.stream, verbose: true }).debug("shown");
    expect(verbose.chunks).toEqual(["shown\n"]);
  });
});
