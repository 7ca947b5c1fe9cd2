import { strict as assert } from "node:assert";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, test } from "node:test";
import { OutputError } from "../../errors";
import { recordingLogger } from "../../__tests__/helpers";
import { TranscriptionResult } from "../../types/contracts";
import { ClipboardWriter } from "../clipboard";
import { EmitSettings, ResultEmitter } from "../resultEmitter";

const RESULT: TranscriptionResult = {
  text: "Hello world.",
  segments: [{ start: 0, end: 1.5, text: "Hello world." }],
  language: "en"
};

class FakeClipboard implements ClipboardWriter {
  readonly written: string[] = [];

  constructor(private readonly failure?: Error) {}

  async writeText(text: string): Promise<void> {
    if (this.failure) throw this.failure;
    this.written.push(text);
  }
}

function emitter(settings: Partial<EmitSettings>, clipboard = new FakeClipboard()) {
  const printed: string[] = [];
  const { logger, entries } = recordingLogger();
  const result = new ResultEmitter({
    settings: { copy: false, timestamps: false, quiet: false, ...settings },
    clipboard,
    logger,
    print: (text) => printed.push(text)
  });
  return { emitter: result, printed, entries, clipboard };
}

describe("ResultEmitter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "verbatim-out-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("prints the transcript when no file is set", async () => {
    const { emitter: out, printed } = emitter({ quiet: true });

    await out.emit(RESULT, 1.5);

    assert.deepEqual(printed, ["Hello world."]);
  });

  test("appends to the output file, one transcript per line", async () => {
    const file = join(dir, "notes.txt");
    const { emitter: out, printed } = emitter({ quiet: true, outputFile: file });

    await out.emit(RESULT, 1.5);
    await out.emit({ ...RESULT, text: "Second." }, 1);

    assert.equal(await readFile(file, "utf-8"), "Hello world.\nSecond.\n");
    assert.deepEqual(printed, []);
  });

  test("reports where the transcript was saved", async () => {
    const file = join(dir, "notes.txt");
    const { emitter: out, printed } = emitter({ outputFile: file });

    await out.emit(RESULT, 1.5);

    assert.deepEqual(printed, [`Saved to ${file}`]);
  });

  test("a file that cannot be written is an output failure", async () => {
    const { emitter: out } = emitter({ quiet: true, outputFile: join(dir, "missing", "notes.txt") });

    await assert.rejects(out.emit(RESULT, 1.5), (error: unknown) => {
      assert.ok(error instanceof OutputError);
      assert.ok(error.message.startsWith("Error writing to file: "));
      return true;
    });
  });

  test("copies the transcript to the clipboard", async () => {
    const { emitter: out, printed, clipboard } = emitter({ copy: true, timestamps: true, quiet: true });

    await out.emit(RESULT, 1.5);

    assert.deepEqual(clipboard.written, ["[0:00-0:01] Hello world."]);
    assert.deepEqual(printed, ["[0:00-0:01] Hello world."]);
  });

  test("confirms the copy outside quiet mode", async () => {
    const { emitter: out, printed } = emitter({ copy: true, outputFile: join(dir, "notes.txt") });

    await out.emit(RESULT, 1.5);

    assert.equal(printed[printed.length - 1], "Copied to clipboard.");
  });

  test("a clipboard failure is a warning, not a failed session", async () => {
    const { emitter: out, entries } = emitter({ copy: true, quiet: true }, new FakeClipboard(new Error("no display")));

    await out.emit(RESULT, 1.5);

    assert.deepEqual(entries, ["warn:Could not copy to clipboard: no display"]);
  });
});
