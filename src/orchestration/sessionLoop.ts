import { RecordOptions } from "../audio/audioCapture";
import { ExitCode } from "../errors";
import { LineEvent } from "../terminal/lineInput";
import { AudioBuffer, TranscriptionBackend, TranscriptionResult } from "../types/contracts";

export type SessionState = "awaiting-start" | "recording" | "transcribing" | "emitting";

export interface SessionSettings {
  once: boolean;
  quiet: boolean;
  timestamps: boolean;
  language?: string;
  sampleRate: number;
}

interface Dependencies {
  settings: SessionSettings;
  backend: TranscriptionBackend;
  recorder: { record(options: RecordOptions): Promise<AudioBuffer> };
  emitter: { emit(result: TranscriptionResult, duration: number): Promise<void> };
  lines: { readonly ended: boolean; next(signal?: AbortSignal): Promise<LineEvent> };
  /** Aborted on Ctrl+C; ends the loop cleanly at the next state boundary. */
  interrupt: AbortSignal;
  print: (text: string) => void;
}

/**
 * Drives record -> transcribe -> emit cycles with one loaded backend.
 * Fatal errors from capture or transcription propagate out of run().
 */
export class SessionLoop {
  private currentState: SessionState = "awaiting-start";
  private sessions = 0;

  constructor(private readonly deps: Dependencies) {}

  get state(): SessionState {
    return this.currentState;
  }

  get sessionCount(): number {
    return this.sessions;
  }

  async run(): Promise<ExitCode> {
    const { settings, interrupt, print } = this.deps;

    for (;;) {
      this.currentState = "awaiting-start";
      this.sessions += 1;
      if (!(await this.awaitStart(this.sessions)) || interrupt.aborted) {
        return ExitCode.Success;
      }

      this.currentState = "recording";
      const audio = await this.deps.recorder.record({ sampleRate: settings.sampleRate, silent: settings.quiet });
      if (interrupt.aborted) {
        return ExitCode.Success;
      }

      if (audio.samples.length === 0) {
        if (!settings.quiet) {
          print("No audio recorded. Try again.\n");
        }
        if (settings.once) {
          return ExitCode.SessionFailed;
        }
        continue;
      }

      this.currentState = "transcribing";
      if (!settings.quiet) {
        print("Transcribing...");
      }
      const result = await this.deps.backend.transcribe(audio.samples, {
        language: settings.language,
        wordTimestamps: settings.timestamps
      });

      this.currentState = "emitting";
      await this.deps.emitter.emit(result, audio.duration);

      if (settings.once || interrupt.aborted) {
        return ExitCode.Success;
      }
    }
  }

  private async awaitStart(session: number): Promise<boolean> {
    const { settings, lines, interrupt, print } = this.deps;
    if (settings.quiet) {
      // No prompt; keep recording back to back while there is input to stop on.
      return session === 1 || !lines.ended;
    }

    const prompt = settings.once ? "Press Enter to start recording" : "Press Enter to start recording (Ctrl+C to quit)";
    print(`[Session ${session}] ${prompt}...`);
    return (await lines.next(interrupt)) === "line";
  }
}
