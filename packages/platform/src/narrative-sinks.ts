import fs from "node:fs";
import path from "node:path";

import type { NarrativeSink } from "./persistence-types";

export class FileNarrativeSink implements NarrativeSink {
  public readonly name = "narrative_log_file";
  public readonly filePath: string;
  private fd: number | undefined;

  public constructor(filePath: string) {
    this.filePath = filePath;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.fd = fs.openSync(filePath, "a");
  }

  public write(line: string): void {
    if (this.fd === undefined) {
      throw new Error(`narrative log ${this.filePath} is closed`);
    }
    fs.writeSync(this.fd, `${line}\n`);
  }

  public close(): void {
    if (this.fd === undefined) {
      return;
    }
    fs.closeSync(this.fd);
    this.fd = undefined;
  }
}

export class StreamNarrativeSink implements NarrativeSink {
  public readonly name = "narrative_log_stream";
  private readonly stream: NodeJS.WritableStream;

  public constructor(stream: NodeJS.WritableStream = process.stderr) {
    this.stream = stream;
  }

  public write(line: string): void {
    this.stream.write(`${line}\n`);
  }

  // The stream belongs to the caller (stderr by default) and stays open.
  public close(): void {}
}
