#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { parseArgs } from "node:util";
import { AudioCapture } from "./audio/audioCapture";
import { InputStreamFactory } from "./audio/inputStream";
import { RecorderInputStreamFactory } from "./audio/recorderInputStream";
import { VerbatimSettings, readSettings } from "./config/settings";
import { ExitCode, FatalError, UsageError, errorMessage, exitCodeFor } from "./errors";
import { Logger, createConsoleLogger } from "./logging/logger";
import { SessionLoop } from "./orchestration/sessionLoop";
import { ClipboardWriter, systemClipboard } from "./output/clipboard";
import { banner } from "./output/formatter";
import { ResultEmitter } from "./output/resultEmitter";
import { selectBackend } from "./stt/backendSelector";
import { DEFAULT_MODEL_SIZE, MODEL_SIZES, ModelSize, assertModelSize } from "./stt/modelSizes";
import { LineInput } from "./terminal/lineInput";
import { TranscriptionBackend } from "./types/contracts";

export interface CliOptions {
  model: ModelSize;
  language?: string;
  output?: string;
  copy: boolean;
  once: boolean;
  quiet: boolean;
  timestamps: boolean;
  help: boolean;
  version: boolean;
}

const USAGE = `Usage: verbatim [options]

Verbatim voice transcription using Whisper

Options:
  -m, --model SIZE      Whisper model size: ${MODEL_SIZES.join(", ")} (default: base)
  -l, --language CODE   Force language (e.g., en, es, fr). Default: auto-detect
  -o, --output FILE     Append transcription to file
  -c, --copy            Copy transcription to clipboard
  -1, --once            Single recording, then exit
  -q, --quiet           Output only transcription (no UI)
      --timestamps      Include segment timestamps in output
  -v, --version         Show version and exit
  -h, --help            Show this help and exit

Examples:
  verbatim                    Interactive mode with base model
  verbatim -m large           Use large model for better accuracy
  verbatim -1 -c              Single recording, copy to clipboard
  verbatim -q | pbcopy        Quiet mode, pipe to clipboard (macOS)
  verbatim -o transcript.txt  Save transcription to file
  verbatim -l en              Force English (skip auto-detection)

Environment:
  VERBATIM_SERVER_URL, VERBATIM_WHISPER_CPP_PATH, VERBATIM_MODEL_DIR,
  VERBATIM_TIMEOUT_MS, VERBATIM_SAMPLE_RATE`;

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      model: { type: "string", short: "m", default: "base" },
      language: { type: "string", short: "l" },
      output: { type: "string", short: "o" },
      copy: { type: "boolean", short: "c", default: false },
      once: { type: "boolean", short: "1", default: false },
      quiet: { type: "boolean", short: "q", default: false },
      timestamps: { type: "boolean", default: false },
      version: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false }
    },
    strict: true,
    allowPositionals: false
  }).values;
}

/** Unknown model sizes are rejected here, before any device or network work. */
export function parseCliArgs(argv: string[]): CliOptions {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(argv);
  } catch (error) {
    throw new UsageError(errorMessage(error), "Run verbatim --help for usage.");
  }

  return {
    model: assertModelSize(values.model ?? DEFAULT_MODEL_SIZE),
    language: values.language || undefined,
    output: values.output || undefined,
    copy: values.copy ?? false,
    once: values.once ?? false,
    quiet: values.quiet ?? false,
    timestamps: values.timestamps ?? false,
    help: values.help ?? false,
    version: values.version ?? false
  };
}

interface InterruptSource {
  on(event: "SIGINT", listener: () => void): unknown;
  off(event: "SIGINT", listener: () => void): unknown;
}

export interface CliDeps {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env: NodeJS.ProcessEnv;
  signals: InterruptSource;
  selectBackend: (settings: VerbatimSettings, logger: Logger) => Promise<TranscriptionBackend>;
  streams: InputStreamFactory;
  clipboard: ClipboardWriter;
}

function defaultDeps(): CliDeps {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    signals: process,
    selectBackend: (settings, logger) => selectBackend(settings, logger),
    streams: new RecorderInputStreamFactory(),
    clipboard: systemClipboard
  };
}

export async function main(argv: string[] = process.argv.slice(2), overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...defaultDeps(), ...overrides };
  const print = (text: string): void => {
    deps.stdout.write(`${text}\n`);
  };

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    reportFatal(error, createConsoleLogger({ quiet: false, stream: deps.stderr }));
    return exitCodeFor(error);
  }

  if (options.help) {
    print(USAGE);
    return ExitCode.Success;
  }
  if (options.version) {
    print(`verbatim ${readVersion()}`);
    return ExitCode.Success;
  }

  const { quiet } = options;
  const logger = createConsoleLogger({ quiet, stream: deps.stderr });
  const settings = readSettings(deps.env);
  const interrupt = new AbortController();
  const onInterrupt = (): void => interrupt.abort();
  const lines = new LineInput(deps.stdin);

  try {
    const backend = await deps.selectBackend(settings, logger);

    if (!quiet) {
      print(banner("verbatim"));
      print(`\nBackend: ${backend.name}`);
      print(`Model: ${options.model}`);
      print("Loading model...");
    }
    await backend.loadModel(options.model);
    if (!quiet) {
      print("Model loaded.\n");
    }

    deps.signals.on("SIGINT", onInterrupt);

    const capture = new AudioCapture({
      streams: deps.streams,
      waitForStop: () => lines.next(interrupt.signal),
      logger,
      print
    });
    const emitter = new ResultEmitter({
      settings: { outputFile: options.output, copy: options.copy, timestamps: options.timestamps, quiet },
      clipboard: deps.clipboard,
      logger,
      print
    });
    const loop = new SessionLoop({
      settings: {
        once: options.once,
        quiet,
        timestamps: options.timestamps,
        language: options.language,
        sampleRate: settings.sampleRate
      },
      backend,
      recorder: capture,
      emitter,
      lines,
      interrupt: interrupt.signal,
      print
    });

    const code = await loop.run();
    if (interrupt.signal.aborted && !quiet) {
      print("\n\nGoodbye!");
    }
    return code;
  } catch (error) {
    reportFatal(error, logger);
    return exitCodeFor(error);
  } finally {
    deps.signals.off("SIGINT", onInterrupt);
    lines.close();
  }
}

function reportFatal(error: unknown, logger: Logger): void {
  if (error instanceof FatalError) {
    logger.error(error.message);
    if (error.hint) logger.error(error.hint);
    return;
  }
  logger.error(error instanceof Error && error.stack ? error.stack : errorMessage(error));
}

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

if (require.main === module) {
  void main().then((code) => process.exit(code));
}
