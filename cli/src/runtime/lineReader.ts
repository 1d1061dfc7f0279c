import {createInterface, type Interface} from "node:readline";
import type {Readable} from "node:stream";

import {BrokenPipeError, ProtocolError} from "../errors.js";

interface PendingRead {
  resolve(line: string): void;
  reject(error: Error): void;
  timer: NodeJS.Timeout;
}

/**
 * Pulls newline-delimited text from a stream one line at a time. Lines that
 * arrive while nobody is reading are buffered in order.
 */
export class LineReader {
  private readonly lines: string[] = [];
  private readonly rl: Interface;
  private pending: PendingRead | undefined;
  private ended = false;

  constructor(input: Readable) {
    this.rl = createInterface({input, crlfDelay: Infinity});
    this.rl.on("line", (line) => {
      if (line.trim() === "") {
        return;
      }
      const pending = this.pending;
      if (pending) {
        this.pending = undefined;
        clearTimeout(pending.timer);
        pending.resolve(line);
      } else {
        this.lines.push(line);
      }
    });
    this.rl.on("close", () => this.end());
    input.on("error", () => this.end());
  }

  get closed(): boolean {
    return this.ended;
  }

  /**
   * Next line, rejecting with ProtocolError after `timeoutMs` and with
   * BrokenPipeError once the stream has ended.
   */
  next(timeoutMs: number): Promise<string> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.ended) {
      return Promise.reject(new BrokenPipeError());
    }
    if (this.pending) {
      return Promise.reject(new ProtocolError("A read is already waiting for the MCP server"));
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = undefined;
        reject(new ProtocolError(`MCP server response timed out after ${timeoutMs} ms`));
      }, timeoutMs);
      this.pending = {resolve, reject, timer};
    });
  }

  close(): void {
    this.rl.close();
  }

  private end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      clearTimeout(pending.timer);
      pending.reject(new BrokenPipeError());
    }
  }
}
