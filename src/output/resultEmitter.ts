import { appendFile } from "node:fs/promises";
import { OutputError, errorMessage } from "../errors";
import { Logger } from "../logging/logger";
import { TranscriptionResult } from "../types/contracts";
import { ClipboardWriter } from "./clipboard";
import { clipboardText, formatOutput } from "./formatter";

export interface EmitSettings {
  /** Append here instead of printing. */
  outputFile?: string;
  copy: boolean;
  timestamps: boolean;
  quiet: boolean;
}

interface ResultEmitterDeps {
  settings: EmitSettings;
  clipboard: ClipboardWriter;
  logger: Logger;
  print: (text: string) => void;
}

export class ResultEmitter {
  constructor(private readonly deps: ResultEmitterDeps) {}

  async emit(result: TranscriptionResult, duration: number): Promise<void> {
    const { settings, print } = this.deps;
    const output = formatOutput(result, duration, { timestamps: settings.timestamps, quiet: settings.quiet });

    if (settings.outputFile) {
      try {
        await appendFile(settings.outputFile, output.endsWith("\n") ? output : `${output}\n`, "utf-8");
      } catch (error) {
        throw new OutputError(`Error writing to file: ${errorMessage(error)}`, undefined, { cause: error });
      }
      if (!settings.quiet) {
        print(`Saved to ${settings.outputFile}`);
      }
    } else {
      print(output);
    }

    if (settings.copy) {
      await this.copy(clipboardText(result, settings.timestamps));
    }
  }

  private async copy(text: string): Promise<void> {
    try {
      await this.deps.clipboard.writeText(text);
      if (!this.deps.settings.quiet) {
        this.deps.print("Copied to clipboard.");
      }
    } catch (error) {
      this.deps.logger.warn(`Could not copy to clipboard: ${errorMessage(error)}`);
    }
  }
}
