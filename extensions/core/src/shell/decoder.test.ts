import { describe, it, expect, vi } from "vitest";
import { LineDecoder, decodeLines } from "./decoder.js";

describe("LineDecoder", () => {
  it("emits lines across chunk boundaries", () => {
    const lines: string[] = [];
    const decoder = new LineDecoder((line) => lines.push(line), vi.fn());
    decoder.push(Buffer.from("first li"));
    decoder.push(Buffer.from("ne\nsecond\nthi"));
    expect(lines).toEqual(["first line", "second"]);
    decoder.end();
    expect(lines).toEqual(["first line", "second", "thi"]);
  });

  it("strips trailing whitespace and carriage returns", () => {
    expect(decodeLines(Buffer.from("  indented  \r\nnext\t\n"), vi.fn())).toEqual(["  indented", "next"]);
  });

  it("keeps multi-byte characters split between chunks", () => {
    const lines: string[] = [];
    const bytes = Buffer.from("héllo\n");
    const decoder = new LineDecoder((line) => lines.push(line), vi.fn());
    decoder.push(bytes.subarray(0, 2));
    decoder.push(bytes.subarray(2));
    expect(lines).toEqual(["héllo"]);
  });

  it("drops lines that are not valid utf-8", () => {
    const onUndecodable = vi.fn();
    const lines = decodeLines(Buffer.from([0x6f, 0x6b, 0x0a, 0xff, 0xfe, 0x0a, 0x61, 0x0a]), onUndecodable);
    expect(lines).toEqual(["ok", "a"]);
    expect(onUndecodable).toHaveBeenCalledTimes(1);
    expect(onUndecodable.mock.calls[0]?.[0]).toEqual(Buffer.from([0xff, 0xfe]));
  });

  it("emits empty lines in the middle of output", () => {
    expect(decodeLines(Buffer.from("a\n\nb"), vi.fn())).toEqual(["a", "", "b"]);
  });
});
