import { strict as assert } from "node:assert";
import { test } from "node:test";
import { readSettings } from "../../config/settings";
import { silentLogger } from "../../logging/logger";
import { chooseBackend, probeHost, selectBackend } from "../backendSelector";

test("the accelerated backend is chosen only on Apple Silicon with whisper.cpp installed", () => {
  assert.deepEqual(chooseBackend({ platform: "darwin", arch: "arm64", whisperCppBinary: "/opt/bin/whisper-cli" }), {
    kind: "whisper-cpp",
    binaryPath: "/opt/bin/whisper-cli"
  });
  assert.deepEqual(chooseBackend({ platform: "darwin", arch: "arm64" }), { kind: "http" });
  assert.deepEqual(chooseBackend({ platform: "darwin", arch: "x64", whisperCppBinary: "whisper-cli" }), {
    kind: "http"
  });
  assert.deepEqual(chooseBackend({ platform: "linux", arch: "x64", whisperCppBinary: "whisper-cli" }), {
    kind: "http"
  });
});

test("the same capabilities always give the same choice", () => {
  const host = { platform: "darwin", arch: "arm64", whisperCppBinary: "whisper-cli" } as const;
  assert.deepEqual(chooseBackend(host), chooseBackend(host));
});

test("other hosts are not probed for whisper.cpp", async () => {
  let lookups = 0;
  const host = await probeHost(readSettings({}), {
    platform: "linux",
    arch: "x64",
    findBinary: async () => {
      lookups += 1;
      return "whisper-cli";
    }
  });

  assert.equal(lookups, 0);
  assert.deepEqual(host, { platform: "linux", arch: "x64" });
});

test("the configured whisper.cpp path is the one looked up", async () => {
  const looked: Array<string | undefined> = [];
  await probeHost(readSettings({ VERBATIM_WHISPER_CPP_PATH: "/opt/whisper-cli" }), {
    platform: "darwin",
    arch: "arm64",
    findBinary: async (path) => {
      looked.push(path);
      return path;
    }
  });

  assert.deepEqual(looked, ["/opt/whisper-cli"]);
});

test("a missing optional component falls back to the server backend", async () => {
  const backend = await selectBackend(readSettings({}), silentLogger, {
    platform: "darwin",
    arch: "arm64",
    findBinary: async () => undefined
  });
  assert.equal(backend.name, "faster-whisper-server");
});

test("Apple Silicon with whisper.cpp gets the accelerated backend", async () => {
  const backend = await selectBackend(readSettings({}), silentLogger, {
    platform: "darwin",
    arch: "arm64",
    findBinary: async () => "whisper-cli"
  });
  assert.equal(backend.name, "whisper-cpp");
});
