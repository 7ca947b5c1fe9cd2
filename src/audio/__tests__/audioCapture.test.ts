import { strict as assert } from "node:assert";
import { test } from "node:test";
import { CaptureUnavailableError, ExitCode, exitCodeFor } from "../../errors";
import { recordingLogger } from "../../__tests__/helpers";
import { AudioCapture } from "../audioCapture";
import { InputStream, InputStreamCallbacks, InputStreamFactory, InputStreamOptions } from "../inputStream";

class FakeStreams implements InputStreamFactory {
  openedWith?: InputStreamOptions;
  closed = 0;

  constructor(
    private readonly onOpen: (callbacks: InputStreamCallbacks) => void = () => undefined,
    private readonly onClose: (callbacks: InputStreamCallbacks) => void = () => undefined,
    private readonly openError?: Error
  ) {}

  async open(options: InputStreamOptions, callbacks: InputStreamCallbacks): Promise<InputStream> {
    if (this.openError) {
      throw this.openError;
    }
    this.openedWith = options;
    this.onOpen(callbacks);
    return {
      close: async () => {
        this.closed += 1;
        this.onClose(callbacks);
      }
    };
  }
}

function capture(streams: InputStreamFactory, waitForStop: () => Promise<unknown> = () => Promise.resolve()) {
  const { logger, entries } = recordingLogger();
  const printed: string[] = [];
  const recorder = new AudioCapture({ streams, waitForStop, logger, print: (text) => printed.push(text) });
  return { recorder, entries, printed };
}

test("records every chunk delivered before the stop trigger", async () => {
  const streams = new FakeStreams((callbacks) => {
    callbacks.onChunk(new Float32Array([0.5, 0.5]));
    callbacks.onChunk(new Float32Array([-0.5, 0.25]));
  });
  const { recorder, printed } = capture(streams);

  const buffer = await recorder.record();

  assert.deepEqual(Array.from(buffer.samples), [0.5, 0.5, -0.5, 0.25]);
  assert.equal(buffer.sampleRate, 16_000);
  assert.equal(buffer.duration, 4 / 16_000);
  assert.deepEqual(streams.openedWith, { sampleRate: 16_000, channels: 1 });
  assert.equal(streams.closed, 1);
  assert.deepEqual(printed, ["\nRecording... Press Enter to stop.\n"]);
});

test("silent recording prints no prompt and honours the sample rate", async () => {
  const streams = new FakeStreams((callbacks) => callbacks.onChunk(new Float32Array(8)));
  const { recorder, printed } = capture(streams);

  const buffer = await recorder.record({ sampleRate: 8_000, silent: true });

  assert.deepEqual(printed, []);
  assert.equal(buffer.duration, 0.001);
  assert.deepEqual(streams.openedWith, { sampleRate: 8_000, channels: 1 });
});

test("chunks flushed while the stream closes are discarded", async () => {
  const streams = new FakeStreams(
    (callbacks) => callbacks.onChunk(new Float32Array([0.25])),
    (callbacks) => callbacks.onChunk(new Float32Array([0.75, 0.75]))
  );
  const { recorder } = capture(streams);

  const buffer = await recorder.record({ silent: true });

  assert.deepEqual(Array.from(buffer.samples), [0.25]);
});

test("stopping before any audio arrives yields an empty buffer", async () => {
  const { recorder } = capture(new FakeStreams());

  const buffer = await recorder.record({ silent: true });

  assert.equal(buffer.samples.length, 0);
  assert.equal(buffer.duration, 0);
});

test("stream warnings are logged and recording continues", async () => {
  const streams = new FakeStreams((callbacks) => {
    callbacks.onWarning("input overflow");
    callbacks.onChunk(new Float32Array([0.5]));
  });
  const { recorder, entries } = capture(streams);

  const buffer = await recorder.record({ silent: true });

  assert.deepEqual(entries, ["warn:Audio stream: input overflow"]);
  assert.equal(buffer.samples.length, 1);
});

test("a device that cannot be opened fails with the capture exit status", async () => {
  const openError = new CaptureUnavailableError("Could not access microphone: no audio recorder found.");
  const { recorder, printed } = capture(new FakeStreams(undefined, undefined, openError));

  await assert.rejects(recorder.record(), (error: unknown) => {
    assert.equal(error, openError);
    assert.equal(exitCodeFor(error), ExitCode.CaptureUnavailable);
    return true;
  });
  assert.deepEqual(printed, []);
});

test("a stream error mid-recording ends the recording and closes the stream", async () => {
  const lost = new CaptureUnavailableError("Could not access microphone: device lost");
  const streams = new FakeStreams((callbacks) => {
    setImmediate(() => callbacks.onError(lost));
  });
  const { recorder } = capture(streams, () => new Promise<never>(() => undefined));

  await assert.rejects(recorder.record({ silent: true }), (error: unknown) => error === lost);
  assert.equal(streams.closed, 1);
});

test("plain stream errors are reported as capture failures", async () => {
  const streams = new FakeStreams((callbacks) => {
    setImmediate(() => callbacks.onError(new Error("boom")));
  });
  const { recorder } = capture(streams, () => new Promise<never>(() => undefined));

  await assert.rejects(recorder.record({ silent: true }), (error: unknown) => {
    assert.ok(error instanceof CaptureUnavailableError);
    assert.equal(error.message, "Could not access microphone: boom");
    return true;
  });
});
