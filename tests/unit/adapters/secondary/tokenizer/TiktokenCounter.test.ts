import { TiktokenCounter } from "../../../../../src/adapters/secondary/tokenizer/TiktokenCounter";

describe("TiktokenCounter", () => {
  const counter = new TiktokenCounter();

  test("uses cl100k_base by default", () => {
    expect(counter.encodingName).toBe("cl100k_base");
  });

  test("counts tokens of a known string", () => {
    expect(counter.count("hello world")).toBe(2);
  });

  test("an empty string has no tokens", () => {
    expect(counter.count("")).toBe(0);
  });

  test("is deterministic across calls and instances", () => {
    const text = "def main():\n    print('repository digest')\n";
    const first = counter.count(text);
    expect(counter.count(text)).toBe(first);
    expect(new TiktokenCounter().count(text)).toBe(first);
  });

  test("counts special-token text as ordinary text", () => {
    expect(() => counter.count("<|endoftext|>")).not.toThrow();
    expect(counter.count("<|endoftext|>")).toBeGreaterThan(1);
  });
});
