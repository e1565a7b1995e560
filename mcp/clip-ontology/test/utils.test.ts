import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ConfigError } from "../src/errors.js";
import { optionValue } from "../src/utils/args.js";
import {
  DEFAULT_SETTINGS,
  loadConfig,
  redactConfig,
  resolveSettings,
  updateConfig,
} from "../src/utils/config.js";
import { firstJsonObject, parseModelJson } from "../src/utils/json.js";
import { Mutex } from "../src/utils/mutex.js";
import { PROJECT_ROOT } from "../src/utils/paths.js";

describe("optionValue", () => {
  it("keeps everything after the first equals sign", () => {
    expect(optionValue("--dir=/x=y")).toBe("/x=y");
    expect(optionValue("--format=values")).toBe("values");
    expect(optionValue("--output=")).toBe("");
    expect(optionValue("--help")).toBe("");
  });
});

describe("parseModelJson", () => {
  it("parses bare and fenced JSON", () => {
    expect(parseModelJson('{"clips": []}')).toEqual({ clips: [] });
    expect(parseModelJson('```json\n{"clips": [1]}\n```')).toEqual({ clips: [1] });
    expect(parseModelJson('```\n{"a": true}\n```')).toEqual({ a: true });
  });

  it("finds an object inside surrounding prose", () => {
    expect(parseModelJson('Here you go: {"note": "a } brace", "n": {"x": 1}} Hope it helps!')).toEqual({
      note: "a } brace",
      n: { x: 1 },
    });
  });

  it("fails when there is no object", () => {
    expect(() => parseModelJson("no json here")).toThrow("No JSON object found in model response");
    expect(() => parseModelJson("{ broken")).toThrow("No JSON object found in model response");
  });
});

describe("firstJsonObject", () => {
  it("skips escaped quotes inside strings", () => {
    expect(firstJsonObject('x {"q": "say \\"}\\""} y')).toBe('{"q": "say \\"}\\""}');
    expect(firstJsonObject("nothing")).toBeNull();
  });
});

describe("Mutex", () => {
  it("runs holders one at a time in request order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    const slow = mutex.runExclusive(async () => {
      events.push("slow:start");
      await new Promise((resolve) => setTimeout(resolve, 20));
      events.push("slow:end");
      return 1;
    });
    const fast = mutex.runExclusive(() => {
      events.push("fast");
      return 2;
    });

    expect(mutex.locked).toBe(true);
    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
    expect(events).toEqual(["slow:start", "slow:end", "fast"]);
  });

  it("releases the lock when a holder fails", async () => {
    const mutex = new Mutex();
    const failing = mutex.runExclusive(() => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive(() => "ran");

    await expect(failing).rejects.toThrow("boom");
    expect(await next).toBe("ran");
    expect(mutex.locked).toBe(false);
  });
});

describe("config", () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "clip-ontology-config-"));
    configPath = path.join(dir, "config.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("treats a missing or unreadable file as empty", () => {
    expect(loadConfig(configPath)).toEqual({});
    fs.writeFileSync(configPath, "{ nope");
    expect(loadConfig(configPath)).toEqual({});
    fs.writeFileSync(configPath, "[1, 2]");
    expect(loadConfig(configPath)).toEqual({});
  });

  it("fills in defaults", () => {
    expect(resolveSettings({})).toEqual(DEFAULT_SETTINGS);
    expect(resolveSettings({ unrelated: "kept out" })).toEqual(DEFAULT_SETTINGS);
  });

  it("resolves relative paths against the project root", () => {
    const settings = resolveSettings({
      ontologyDir: "/srv/ontology",
      serviceAccountPath: "keys/service-account.json",
      similarityThreshold: 0.9,
    });

    expect(settings.ontologyDir).toBe("/srv/ontology");
    expect(settings.serviceAccountPath).toBe(path.join(PROJECT_ROOT, "keys/service-account.json"));
    expect(settings.similarityThreshold).toBe(0.9);
  });

  it("rejects out-of-range settings", () => {
    expect(() => resolveSettings({ similarityThreshold: 2 })).toThrow(ConfigError);
    expect(() => resolveSettings({ hintLimit: 0 })).toThrow("Invalid configuration: hintLimit");
    expect(() => resolveSettings({ logLevel: "loud" })).toThrow(ConfigError);
  });

  it("merges updates and refuses invalid ones", () => {
    updateConfig({ geminiModel: "gemini-test" }, configPath);
    expect(updateConfig({ hintLimit: 5 }, configPath)).toEqual({ geminiModel: "gemini-test", hintLimit: 5 });

    expect(() => updateConfig({ durationTolerance: -1 }, configPath)).toThrow(ConfigError);
    expect(loadConfig(configPath)).toEqual({ geminiModel: "gemini-test", hintLimit: 5 });
  });

  it("shortens the service account path for display", () => {
    expect(redactConfig({ serviceAccountPath: "/home/me/keys/service.json", hintLimit: 5 })).toEqual({
      serviceAccountPath: "/home/me...json",
      hintLimit: 5,
    });
    expect(redactConfig({ serviceAccountPath: "sa.json" })).toEqual({ serviceAccountPath: "***" });
  });
});
