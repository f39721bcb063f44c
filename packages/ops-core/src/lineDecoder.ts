import stripAnsi from "strip-ansi";

type OnLine = (line: string) => void;

// Progress bars redraw with bare CR, so CR and LF both end a line.
export class LineDecoder {
  private buffer = "";

  push(chunk: string, onLine: OnLine): void {
    this.buffer += chunk;
    while (true) {
      const idx = this.buffer.search(/[\r\n]/);
      if (idx === -1) {
        break;
      }
      const line = cleanLine(this.buffer.slice(0, idx));
      this.buffer = this.buffer.slice(idx + 1);
      if (line) {
        onLine(line);
      }
    }
  }

  flush(onLine: OnLine): void {
    const line = cleanLine(this.buffer);
    this.buffer = "";
    if (line) {
      onLine(line);
    }
  }
}

export function cleanLine(raw: string): string {
  return stripAnsi(raw)
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g, "")
    .trim();
}
