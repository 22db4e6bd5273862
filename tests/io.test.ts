import { PassThrough, Writable } from "node:stream";
import { describe, it, expect } from "vitest";
import { createConsoleIO } from "../src/console/io.js";

function streams() {
  const input = new PassThrough();
  const written: string[] = [];
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk.toString("utf8"));
      callback();
    },
  });
  return { input, output, written };
}

describe("createConsoleIO", () => {
  it("reads one line per prompt and null at end of input", async () => {
    const { input, output } = streams();
    const io = createConsoleIO(input, output);
    input.end("help\ny\n");

    const answers = [await io.prompt("> "), await io.prompt("> "), await io.prompt("> ")];

    expect(answers).toEqual(["help", "y", null]);
    io.close();
  });

  it("writes the question before reading and prints whole lines", async () => {
    const { input, output, written } = streams();
    const io = createConsoleIO(input, output);
    input.end("schedule week.html\n");

    const answer = await io.prompt("Enter command code: ");
    io.print("done");
    io.print();

    expect(answer).toBe("schedule week.html");
    expect(written.join("")).toBe("Enter command code: done\n\n");
    io.close();
  });

  it("keeps blank lines as empty strings", async () => {
    const { input, output } = streams();
    const io = createConsoleIO(input, output);
    input.end("\n");

    expect(await io.prompt("")).toBe("");
    expect(await io.prompt("")).toBeNull();
    io.close();
  });

  it("stops reading once closed", async () => {
    const { input, output } = streams();
    const io = createConsoleIO(input, output);

    io.close();

    expect(await io.prompt("> ")).toBeNull();
  });
});
