import {
  ReadableStream,
  WritableStream,
  type ReadableStreamDefaultController,
} from "node:stream/web";
import { logger } from "@sfx/shared";
import type { IExtension, ISuffixAutomaton } from "./domain";
import { toSymbols } from "./symbols";

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

/**
 * Adapts a synchronous ISuffixAutomaton to a web streams interface,
 * providing a WritableStream for input symbols (or text) and a ReadableStream
 * of the extension each symbol produced. Text may be split anywhere, including
 * inside a surrogate pair. Closing the writable finalizes the automaton.
 */
export class SuffixAutomatonStream {
  readonly readable: ReadableStream<IExtension>;
  readonly writable: WritableStream<number | string>;

  constructor(automaton: ISuffixAutomaton) {
    let controller: ReadableStreamDefaultController<IExtension> | null = null;

    this.readable = new ReadableStream<IExtension>({
      start(c) {
        controller = c;
      },
    });

    const output = (): ReadableStreamDefaultController<IExtension> => {
      if (!controller) throw new Error("Readable side is not started");
      return controller;
    };

    // Trailing high surrogate of the last text chunk, joined to the next one
    let pending = "";

    const consume = (symbols: number[]) => {
      try {
        for (const symbol of symbols) {
          output().enqueue(automaton.extend(symbol));
        }
      } catch (error) {
        // Surface construction errors on both sides of the stream
        output().error(error);
        throw error;
      }
    };

    this.writable = new WritableStream<number | string>({
      write(chunk) {
        if (typeof chunk !== "string") {
          consume([...toSymbols(pending), chunk]);
          pending = "";
          return;
        }

        let text = pending + chunk;
        pending = "";
        if (isHighSurrogate(text.charCodeAt(text.length - 1))) {
          pending = text.slice(-1);
          text = text.slice(0, -1);
        }
        consume(toSymbols(text));
      },
      close() {
        consume(toSymbols(pending));
        pending = "";
        automaton.finalize();
        output().close();
        logger.stream.debug("Stream closed", {
          symbols: automaton.symbolsConsumed,
          states: automaton.size,
        });
      },
      abort(reason) {
        output().error(reason);
      },
    });
  }
}
