import { StringDecoder } from 'string_decoder';

/**
 * Reassembles output chunks into complete lines.
 *
 * Lines end at `\n`, `\r\n` or a lone `\r`. Whatever follows the last
 * terminator is held back until more data arrives or `flush()` is called.
 * A `\r` ending one chunk and a `\n` starting the next count as a single
 * terminator.
 */
export class LineFramer {
  private decoder = new StringDecoder('utf8');
  private pending = '';
  private skipLineFeed = false;

  /**
   * Feed a chunk and get back the lines it completed
   */
  feed(chunk: Buffer | string): string[] {
    const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    return this.split(text);
  }

  /**
   * Emit the buffered partial line, if any, and reset for the next stream
   */
  flush(): string[] {
    const lines = this.split(this.decoder.end());
    if (this.pending.length > 0) {
      lines.push(this.pending);
    }
    this.reset();
    return lines;
  }

  reset(): void {
    this.decoder = new StringDecoder('utf8');
    this.pending = '';
    this.skipLineFeed = false;
  }

  private split(text: string): string[] {
    const lines: string[] = [];
    let start = 0;

    if (this.skipLineFeed && text.length > 0) {
      this.skipLineFeed = false;
      if (text.charCodeAt(0) === 0x0a) {
        start = 1;
      }
    }

    for (let i = start; i < text.length; i++) {
      const code = text.charCodeAt(i);
      if (code !== 0x0a && code !== 0x0d) {
        continue;
      }

      lines.push(this.pending + text.slice(start, i));
      this.pending = '';

      if (code === 0x0d) {
        if (i + 1 < text.length) {
          if (text.charCodeAt(i + 1) === 0x0a) {
            i++;
          }
        } else {
          // \r at the chunk edge, the \n may arrive with the next chunk
          this.skipLineFeed = true;
        }
      }
      start = i + 1;
    }

    this.pending += text.slice(start);
    return lines;
  }
}
