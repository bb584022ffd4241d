import { describe, it, expect, afterEach } from "vitest";
import { systemIO, writeOut, type OutputStream } from "../iostreams.js";

const originals = {
  stdin: Object.getOwnPropertyDescriptor(process.stdin, "isTTY"),
  stdout: Object.getOwnPropertyDescriptor(process.stdout, "isTTY"),
};

function setTTY(stream: NodeJS.ReadStream | NodeJS.WriteStream, value: boolean) {
  Object.defineProperty(stream, "isTTY", { value, configurable: true, writable: true });
}

function restoreTTY(stream: NodeJS.ReadStream | NodeJS.WriteStream, descriptor?: PropertyDescriptor) {
  if (descriptor) {
    Object.defineProperty(stream, "isTTY", descriptor);
  } else {
    Reflect.deleteProperty(stream, "isTTY");
  }
}

afterEach(() => {
  restoreTTY(process.stdin, originals.stdin);
  restoreTTY(process.stdout, originals.stdout);
});

describe("systemIO", () => {
  it("writes to process.stdout", () => {
    expect(systemIO({ prompt: "enabled" }).out).toBe(process.stdout);
  });

  it("reflects whether stdout is a terminal", () => {
    setTTY(process.stdout, true);
    expect(systemIO({ prompt: "enabled" }).isStdoutTTY()).toBe(true);

    setTTY(process.stdout, false);
    expect(systemIO({ prompt: "enabled" }).isStdoutTTY()).toBe(false);
  });

  it("can prompt when both stdin and stdout are terminals", () => {
    setTTY(process.stdin, true);
    setTTY(process.stdout, true);

    expect(systemIO({ prompt: "enabled" }).canPrompt()).toBe(true);
  });

  it("cannot prompt when prompting is disabled", () => {
    setTTY(process.stdin, true);
    setTTY(process.stdout, true);

    expect(systemIO({ prompt: "disabled" }).canPrompt()).toBe(false);
  });

  it.each([
    [false, true],
    [true, false],
    [false, false],
  ])("cannot prompt with stdin tty=%s and stdout tty=%s", (stdin, stdout) => {
    setTTY(process.stdin, stdin);
    setTTY(process.stdout, stdout);

    expect(systemIO({ prompt: "enabled" }).canPrompt()).toBe(false);
  });
});

describe("writeOut", () => {
  it("resolves once the chunk is written", async () => {
    const chunks: string[] = [];
    const out: OutputStream = {
      write(chunk, callback) {
        chunks.push(chunk);
        callback();
        return true;
      },
    };

    await writeOut(out, "hello\n");

    expect(chunks).toEqual(["hello\n"]);
  });

  it("rejects with the stream's error", async () => {
    const failure = new Error("EPIPE");
    const out: OutputStream = {
      write(_chunk, callback) {
        callback(failure);
        return false;
      },
    };

    await expect(writeOut(out, "hello\n")).rejects.toBe(failure);
  });
});
