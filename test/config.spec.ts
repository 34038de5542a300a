// test/config.spec.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import { Binder } from "../src/binder/Binder";
import {
  binderConfigFrom,
  loadBinderSettings,
  loadBinderSettingsFromFiles,
} from "../src/config/binderSettings";
import { loadEnvFilesOrThrow } from "../src/config/env";
import { field } from "../src/dsl/field";
import type { FieldsShape } from "../src/dsl/types";
import { makeRequest } from "./helpers/request";

describe("loadBinderSettings", () => {
  it("falls back to defaults", () => {
    expect(loadBinderSettings({})).toEqual({
      skipFilled: true,
      preserveBody: false,
      bodyLimit: "1mb",
      splitSymbol: ",",
      logLevel: "info",
    });
  });

  it("reads every BINDER_* variable", () => {
    expect(
      loadBinderSettings({
        BINDER_SKIP_FILLED: "FALSE",
        BINDER_PRESERVE_BODY: " true ",
        BINDER_BODY_LIMIT: "2048",
        BINDER_SPLIT_SYMBOL: "|",
        LOG_LEVEL: "debug",
      })
    ).toEqual({
      skipFilled: false,
      preserveBody: true,
      bodyLimit: 2048,
      splitSymbol: "|",
      logLevel: "debug",
    });
  });

  it("keeps unit-suffixed limits as text", () => {
    expect(loadBinderSettings({ BINDER_BODY_LIMIT: "100kb" }).bodyLimit).toBe(
      "100kb"
    );
  });

  it("fails fast on invalid values", () => {
    expect(() => loadBinderSettings({ BINDER_SKIP_FILLED: "maybe" })).toThrow(
      /^Invalid binder settings: BINDER_SKIP_FILLED: /
    );
    expect(() => loadBinderSettings({ BINDER_BODY_LIMIT: "lots" })).toThrow(
      "Invalid binder settings: BINDER_BODY_LIMIT: expected bytes or e.g. 100kb"
    );
  });
});

describe("binderConfigFrom", () => {
  class Filter {
    static readonly fields = {
      ids: field.list(field.int32({ query: "ids" })),
    } satisfies FieldsShape;

    ids: number[] = [];
  }

  it("wires the split symbol into the query source", async () => {
    const settings = loadBinderSettings({ BINDER_SPLIT_SYMBOL: "|" });
    const binder = new Binder(binderConfigFrom(settings));
    const f = new Filter();

    await binder.bind(makeRequest({ url: "/?ids=1|2" }), f);
    expect(f.ids).toEqual([1, 2]);
  });

  it("wires skipFilled", async () => {
    const settings = loadBinderSettings({ BINDER_SKIP_FILLED: "false" });
    const binder = new Binder(binderConfigFrom(settings));
    const f = new Filter();
    f.ids = [9];

    await binder.bind(makeRequest({ url: "/?ids=1" }), f);
    expect(f.ids).toEqual([1]);
  });
});

describe("loadEnvFilesOrThrow", () => {
  const keys = ["BINDER_TEST_A", "BINDER_TEST_B"];

  afterEach(() => {
    for (const key of keys) delete process.env[key];
  });

  it("loads and expands env files", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "binder-env-"));
    const file = path.join(dir, ".env.test");
    fs.writeFileSync(
      file,
      "BINDER_TEST_A=alpha\nBINDER_TEST_B=${BINDER_TEST_A}-beta\n"
    );

    try {
      expect(loadEnvFilesOrThrow([file])).toEqual([path.resolve(file)]);
      expect(process.env.BINDER_TEST_A).toBe("alpha");
      expect(process.env.BINDER_TEST_B).toBe("alpha-beta");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("throws when nothing loaded unless missing files are allowed", () => {
    const missing = path.join(os.tmpdir(), "binder-env-missing", ".env");

    expect(() => loadEnvFilesOrThrow([missing])).toThrow(
      `No env files loaded from: ${missing}`
    );
    expect(loadEnvFilesOrThrow([missing], { allowMissing: true })).toEqual([]);
  });
});

describe("loadBinderSettingsFromFiles", () => {
  const keys = ["BINDER_SPLIT_SYMBOL", "BINDER_PRESERVE_BODY"];

  afterEach(() => {
    for (const key of keys) delete process.env[key];
  });

  it("reads settings from env files", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "binder-settings-"));
    const file = path.join(dir, ".env");
    fs.writeFileSync(
      file,
      "BINDER_SPLIT_SYMBOL=|\nBINDER_PRESERVE_BODY=true\n"
    );

    try {
      const settings = loadBinderSettingsFromFiles([file]);
      expect(settings.splitSymbol).toBe("|");
      expect(settings.preserveBody).toBe(true);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
