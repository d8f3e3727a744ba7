import { describe, test, expect, jest, beforeEach, afterEach } from "@jest/globals";
import {
  DEBUG_ENV_VAR,
  debugLog,
  isDebugEnabled,
  parseDebugTopics,
} from "../../src/utils/debug";

describe("parseDebugTopics", () => {
  test.each<[string | undefined, ReadonlyArray<string>]>([
    [undefined, []],
    ["", []],
    ["1", ["*"]],
    ["TRUE", ["*"]],
    ["engine, store,", ["engine", "store"]],
  ])("%p -> %p", (raw, topics) => {
    expect(parseDebugTopics(raw)).toEqual(topics);
  });
});

function silenceWarn() {
  return jest.spyOn(console, "warn").mockImplementation(() => undefined);
}

describe("debugLog", () => {
  const saved = process.env[DEBUG_ENV_VAR];
  let warn: ReturnType<typeof silenceWarn>;

  beforeEach(() => {
    warn = silenceWarn();
  });

  afterEach(() => {
    warn.mockRestore();
    if (saved === undefined) delete process.env[DEBUG_ENV_VAR];
    else process.env[DEBUG_ENV_VAR] = saved;
  });

  test("silent by default", () => {
    delete process.env[DEBUG_ENV_VAR];
    debugLog("engine", "hello");
    expect(isDebugEnabled()).toBe(false);
    expect(warn).not.toHaveBeenCalled();
  });

  test("only enabled topics are written", () => {
    process.env[DEBUG_ENV_VAR] = "store";
    debugLog("engine", "skipped");
    debugLog("store", "written", { n: 1 });
    expect(warn.mock.calls).toEqual([["[DBG:store] written", { n: 1 }]]);
  });

  test("wildcard enables everything", () => {
    process.env[DEBUG_ENV_VAR] = "on";
    debugLog("input", "key");
    expect(warn).toHaveBeenCalledWith("[DBG:input] key");
  });
});
