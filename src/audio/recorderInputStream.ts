import { spawn } from "node:child_process";
import * as readline from "node:readline";
import { Readable } from "node:stream";
import { CaptureUnavailableError, sanitizeForLog } from "../errors";
import { binaryExists } from "../system/binaries";
import { InputStream, InputStreamCallbacks, InputStreamFactory, InputStreamOptions } from "./inputStream";
import { Float32Decoder } from "./pcm";

type RecorderBackend = "sox" | "arecord" | "ffmpeg";

export interface RecorderInfo {
  backend: RecorderBackend;
  binaryPath: string;
}

/** The slice of ChildProcess the stream relies on. */
export interface RecorderProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "error", listener: (error: Error) => void): unknown;
  once(event: "spawn", listener: () => void): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  off(event: "spawn", listener: () => void): unknown;
  off(event: "error", listener: (error: Error) => void): unknown;
}

interface RecorderInputStreamDeps {
  platform?: NodeJS.Platform;
  detect?: (platform: NodeJS.Platform) => Promise<RecorderInfo | undefined>;
  spawn?: (command: string, args: string[]) => RecorderProcess;
  killTimeoutMs?: number;
}

const DEFAULT_KILL_TIMEOUT_MS = 2000;

/**
 * Input streams backed by an external recorder writing raw f32le PCM to
 * stdout. Each stdout read is delivered as one chunk.
 */
export class RecorderInputStreamFactory implements InputStreamFactory {
  private readonly platform: NodeJS.Platform;
  private readonly detect: (platform: NodeJS.Platform) => Promise<RecorderInfo | undefined>;
  private readonly spawnRecorder: (command: string, args: string[]) => RecorderProcess;
  private detectedRecorder?: RecorderInfo;
  private detectionDone = false;

  constructor(private readonly deps: RecorderInputStreamDeps = {}) {
    this.platform = deps.platform ?? process.platform;
    this.detect = deps.detect ?? detectRecorder;
    this.spawnRecorder =
      deps.spawn ??
      ((command, args) =>
        spawn(command, args, {
          stdio: ["ignore", "pipe", "pipe"],
          // Own process group, so Ctrl+C in the terminal only reaches us; close() stops the recorder.
          detached: this.platform !== "win32"
        }));
  }

  async open(options: InputStreamOptions, callbacks: InputStreamCallbacks): Promise<InputStream> {
    if (!this.detectionDone) {
      this.detectedRecorder = await this.detect(this.platform);
      this.detectionDone = true;
    }

    const recorder = this.detectedRecorder;
    if (!recorder) {
      throw new CaptureUnavailableError(
        "Could not access microphone: no audio recorder found.",
        getInstallInstructions(this.platform)
      );
    }

    const args = buildRecorderArgs(recorder, options.sampleRate, this.platform);
    const proc = this.spawnRecorder(recorder.binaryPath, args);
    await waitForSpawn(proc, recorder, this.platform);

    return new RecorderInputStream(
      recorder,
      proc,
      callbacks,
      getPermissionHint(this.platform),
      this.deps.killTimeoutMs ?? DEFAULT_KILL_TIMEOUT_MS
    );
  }
}

class RecorderInputStream implements InputStream {
  private closeRequested = false;
  private readonly exited: Promise<void>;

  constructor(
    recorder: RecorderInfo,
    private readonly proc: RecorderProcess,
    callbacks: InputStreamCallbacks,
    hint: string,
    private readonly killTimeoutMs: number
  ) {
    const decoder = new Float32Decoder();
    proc.stdout?.on("data", (chunk: Buffer) => {
      const samples = decoder.decode(chunk);
      if (samples.length > 0) {
        callbacks.onChunk(samples);
      }
    });

    if (proc.stderr) {
      const rl = readline.createInterface({ input: proc.stderr });
      rl.on("line", (line) => {
        const text = sanitizeForLog(line);
        if (text) callbacks.onWarning(text);
      });
      proc.once("close", () => rl.close());
    }

    proc.on("error", (error) => {
      callbacks.onError(
        new CaptureUnavailableError(`Could not access microphone: ${error.message}`, hint, { cause: error })
      );
    });

    this.exited = new Promise<void>((resolve) => {
      proc.once("close", (code, signal) => {
        if (!isExpectedExit(recorder.backend, this.closeRequested, code, signal)) {
          callbacks.onError(
            new CaptureUnavailableError(
              `Could not access microphone: ${recorder.backend} exited with code ${code}`,
              hint
            )
          );
        }
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    this.closeRequested = true;
    if (this.proc.exitCode !== null || this.proc.signalCode !== null) {
      await this.exited;
      return;
    }

    this.proc.kill("SIGTERM");
    const killTimer = setTimeout(() => this.proc.kill("SIGKILL"), this.killTimeoutMs);
    try {
      await this.exited;
    } finally {
      clearTimeout(killTimer);
    }
  }
}

function waitForSpawn(proc: RecorderProcess, recorder: RecorderInfo, platform: NodeJS.Platform): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onSpawn = (): void => {
      proc.off("error", onError);
      resolve();
    };
    const onError = (error: Error): void => {
      proc.off("spawn", onSpawn);
      reject(
        new CaptureUnavailableError(
          `Could not access microphone: failed to start ${recorder.binaryPath} (${error.message})`,
          getPermissionHint(platform),
          { cause: error }
        )
      );
    };
    proc.once("spawn", onSpawn);
    proc.once("error", onError);
  });
}

export function isExpectedExit(
  backend: RecorderBackend,
  stopRequested: boolean,
  code: number | null,
  signal: NodeJS.Signals | null
): boolean {
  // Any exit before close() ends the recording early.
  if (!stopRequested) {
    return false;
  }
  if (code === 0 || (code === null && signal === null)) {
    return true;
  }

  switch (backend) {
    case "arecord":
      return signal === "SIGINT" || signal === "SIGTERM" || signal === "SIGKILL" || code === 1;
    case "ffmpeg":
      return signal === "SIGINT" || signal === "SIGTERM" || signal === "SIGKILL" || code === 255;
    case "sox":
      return signal === "SIGINT" || signal === "SIGTERM" || signal === "SIGKILL";
  }
}

export function buildRecorderArgs(recorder: RecorderInfo, sampleRate: number, platform: NodeJS.Platform): string[] {
  const rate = String(sampleRate);
  switch (recorder.backend) {
    case "sox":
      return ["-q", "-d", "-t", "raw", "-e", "floating-point", "-b", "32", "-L", "-r", rate, "-c", "1", "-"];
    case "arecord":
      return ["-q", "-f", "FLOAT_LE", "-r", rate, "-c", "1", "-t", "raw"];
    case "ffmpeg":
      return [
        "-hide_banner", "-loglevel", "warning", "-nostats",
        "-f", getFFmpegInputFormat(platform), "-i", getFFmpegInputDevice(platform),
        "-ar", rate, "-ac", "1", "-f", "f32le", "-"
      ];
  }
}

function getFFmpegInputFormat(platform: NodeJS.Platform): string {
  switch (platform) {
    case "win32": return "dshow";
    case "darwin": return "avfoundation";
    default: return "pulse";
  }
}

function getFFmpegInputDevice(platform: NodeJS.Platform): string {
  switch (platform) {
    case "win32": return "audio=default";
    case "darwin": return ":default";
    default: return "default";
  }
}

export async function detectRecorder(platform: NodeJS.Platform): Promise<RecorderInfo | undefined> {
  for (const c of getCandidates(platform)) {
    if (await binaryExists(c.binary, platform)) {
      return { backend: c.backend, binaryPath: c.binary };
    }
  }
  return undefined;
}

function getCandidates(platform: NodeJS.Platform): Array<{ backend: RecorderBackend; binary: string }> {
  switch (platform) {
    case "darwin":
      return [
        { backend: "sox", binary: "sox" },
        { backend: "ffmpeg", binary: "ffmpeg" }
      ];
    case "linux":
      return [
        { backend: "arecord", binary: "arecord" },
        { backend: "sox", binary: "sox" },
        { backend: "ffmpeg", binary: "ffmpeg" }
      ];
    case "win32":
      return [
        { backend: "ffmpeg", binary: "ffmpeg" },
        { backend: "sox", binary: "sox" }
      ];
    default:
      return [
        { backend: "sox", binary: "sox" },
        { backend: "ffmpeg", binary: "ffmpeg" }
      ];
  }
}

function getInstallInstructions(platform: NodeJS.Platform): string {
  switch (platform) {
    case "darwin":
      return "Install SoX: brew install sox";
    case "linux":
      return "Install arecord (alsa-utils) or SoX: sudo apt install alsa-utils";
    case "win32":
      return "Install FFmpeg: winget install ffmpeg";
    default:
      return "Install SoX or FFmpeg.";
  }
}

function getPermissionHint(platform: NodeJS.Platform): string {
  switch (platform) {
    case "darwin":
      return "On macOS, check System Settings > Privacy & Security > Microphone for your terminal.";
    case "linux":
      return "Check that an input device is connected and not muted (arecord -l lists capture devices).";
    case "win32":
      return "Check Settings > Privacy & security > Microphone and that a recording device is enabled.";
    default:
      return "Check that a microphone is connected and accessible.";
  }
}
