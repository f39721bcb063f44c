import { describe, expect, it } from "vitest";
import { cleanLine, LineDecoder } from "../src/lineDecoder.js";

describe("LineDecoder", () => {
  it("splits on CR and LF and keeps partial lines buffered", () => {
    const decoder = new LineDecoder();
    const lines: string[] = [];
    decoder.push("first\r\nsec", (line) => lines.push(line));
    expect(lines).toEqual(["first"]);
    decoder.push("ond\n", (line) => lines.push(line));
    decoder.push("tail", (line) => lines.push(line));
    decoder.flush((line) => lines.push(line));
    expect(lines).toEqual(["first", "second", "tail"]);
  });

  it("emits each carriage-return redraw of a progress bar", () => {
    const decoder = new LineDecoder();
    const lines: string[] = [];
    decoder.push(" 10%\r 55%\r100%\n", (line) => lines.push(line));
    expect(lines).toEqual(["10%", "55%", "100%"]);
  });
});

describe("cleanLine", () => {
  it("strips ansi sequences and control characters", () => {
    expect(cleanLine("\u001b[1;32m==>\u001b[0m Making package\u0007  ")).toBe("==> Making package");
  });
});
