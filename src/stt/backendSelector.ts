import { VerbatimSettings } from "../config/settings";
import { Logger } from "../logging/logger";
import { TranscriptionBackend } from "../types/contracts";
import { HttpBackend } from "./httpBackend";
import { ModelManager } from "./modelManager";
import { WhisperCppBackend, findWhisperCppBinary } from "./whisperCppBackend";

export interface HostCapabilities {
  platform: NodeJS.Platform;
  arch: string;
  /** Location of the whisper.cpp CLI, when installed. */
  whisperCppBinary?: string;
}

export type BackendChoice = { kind: "whisper-cpp"; binaryPath: string } | { kind: "http" };

export function isAcceleratedHost(host: Pick<HostCapabilities, "platform" | "arch">): boolean {
  return host.platform === "darwin" && host.arch === "arm64";
}

/** Pure: the same capabilities always give the same choice. */
export function chooseBackend(host: HostCapabilities): BackendChoice {
  if (isAcceleratedHost(host) && host.whisperCppBinary) {
    return { kind: "whisper-cpp", binaryPath: host.whisperCppBinary };
  }
  return { kind: "http" };
}

interface ProbeDeps {
  platform?: NodeJS.Platform;
  arch?: string;
  findBinary?: (settingPath?: string) => Promise<string | undefined>;
}

/** The optional component is only looked for where it would be used. */
export async function probeHost(settings: VerbatimSettings, deps: ProbeDeps = {}): Promise<HostCapabilities> {
  const platform = deps.platform ?? process.platform;
  const arch = deps.arch ?? process.arch;
  if (!isAcceleratedHost({ platform, arch })) {
    return { platform, arch };
  }
  const findBinary = deps.findBinary ?? ((path?: string) => findWhisperCppBinary(path, platform));
  const whisperCppBinary = await findBinary(settings.whisperCppPath || undefined);
  return { platform, arch, whisperCppBinary };
}

export function createBackend(choice: BackendChoice, settings: VerbatimSettings, logger: Logger): TranscriptionBackend {
  switch (choice.kind) {
    case "whisper-cpp":
      return new WhisperCppBackend({
        binaryPath: choice.binaryPath,
        models: new ModelManager({ storageDir: settings.modelDir, logger, timeoutMs: settings.timeoutMs }),
        timeoutMs: settings.timeoutMs,
        sampleRate: settings.sampleRate
      });
    case "http":
      return new HttpBackend({
        baseUrl: settings.serverUrl,
        timeoutMs: settings.timeoutMs,
        sampleRate: settings.sampleRate
      });
  }
}

export async function selectBackend(
  settings: VerbatimSettings,
  logger: Logger,
  deps: ProbeDeps = {}
): Promise<TranscriptionBackend> {
  const host = await probeHost(settings, deps);
  return createBackend(chooseBackend(host), settings, logger);
}
