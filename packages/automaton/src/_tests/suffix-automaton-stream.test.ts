import { ReadableStream } from "node:stream/web";
import { test, expect, describe } from "vitest";
import { SuffixAutomaton } from "../suffix-automaton";
import { SuffixAutomatonStream } from "../suffix-automaton-stream";
import { AutomatonFrozenError } from "../errors";
import type { IExtension } from "../domain";

async function collect(stream: SuffixAutomatonStream): Promise<IExtension[]> {
  const out: IExtension[] = [];
  for await (const extension of stream.readable) out.push(extension);
  return out;
}

describe("SuffixAutomatonStream", () => {
  test("emits one extension per symbol and finalizes on close", async () => {
    const sam = new SuffixAutomaton();
    const stream = new SuffixAutomatonStream(sam);
    const reading = collect(stream);

    const writer = stream.writable.getWriter();
    await writer.write("ab");
    await writer.write(98);
    await writer.close();

    expect(await reading).toEqual([
      { symbol: 97, position: 0, state: 1, clone: null },
      { symbol: 98, position: 1, state: 2, clone: null },
      { symbol: 98, position: 2, state: 3, clone: 4 },
    ]);
    expect(sam.phase).toBe("frozen");
    expect(sam.isSuffix("bb")).toBe(true);
  });

  test("joins a surrogate pair split across writes", async () => {
    const sam = new SuffixAutomaton();
    const stream = new SuffixAutomatonStream(sam);
    const reading = collect(stream);

    const writer = stream.writable.getWriter();
    await writer.write("a\uD83D");
    await writer.write("\uDE80");
    await writer.write("b");
    await writer.close();

    const extensions = await reading;
    expect(extensions.map((e) => e.symbol)).toEqual([97, 0x1f680, 98]);
    expect(sam.symbolsConsumed).toBe(3);
    expect(sam.containsSubstring("🚀")).toBe(true);
    expect(sam.isSuffix("🚀b")).toBe(true);
  });

  test("flushes a dangling high surrogate on close", async () => {
    const sam = new SuffixAutomaton();
    const stream = new SuffixAutomatonStream(sam);
    const reading = collect(stream);

    const writer = stream.writable.getWriter();
    await writer.write("x\uD83D");
    await writer.close();

    expect((await reading).map((e) => e.symbol)).toEqual([120, 0xd83d]);
    expect(sam.symbolsConsumed).toBe(2);
  });

  test("an empty stream finalizes the empty automaton", async () => {
    const sam = new SuffixAutomaton();
    const stream = new SuffixAutomatonStream(sam);
    const reading = collect(stream);

    await stream.writable.close();

    expect(await reading).toEqual([]);
    expect(sam.phase).toBe("frozen");
    expect(sam.isSuffix("")).toBe(true);
  });

  test("construction errors reach both sides", async () => {
    const sam = SuffixAutomaton.from("a");
    sam.finalize();
    const stream = new SuffixAutomatonStream(sam);
    const reader = stream.readable.getReader();

    const writer = stream.writable.getWriter();
    await expect(writer.write(98)).rejects.toBeInstanceOf(AutomatonFrozenError);
    await expect(reader.read()).rejects.toBeInstanceOf(AutomatonFrozenError);
  });

  test("pipes from another readable", async () => {
    const sam = new SuffixAutomaton();
    const stream = new SuffixAutomatonStream(sam);
    const reading = collect(stream);

    const source = new ReadableStream<string>({
      start(controller) {
        controller.enqueue("ban");
        controller.enqueue("ana");
        controller.close();
      },
    });
    await source.pipeTo(stream.writable);

    const extensions = await reading;
    expect(extensions).toHaveLength(6);
    expect(extensions.map((e) => e.position)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(sam.countDistinctSubstrings()).toBe(15);
    expect(sam.occurrenceCount("ana")).toBe(2);
  });
});
