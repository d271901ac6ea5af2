import { describe, expect, it } from "vitest";

import { resolveTidyConfig } from "../config";
import { MemoryAnnotationHost } from "../host/memoryHost";
import { createTidyLogger } from "../logger";
import { TidyMode } from "../mode/tidyMode";
import { parseDocument } from "../parser/outlineParser";
import { TidySession } from "../session/tidySession";

const TEXT = [
  ":PROPERTIES:",
  ":ID: top",
  ":END:",
  "* Task",
  ":PROPERTIES:",
  ":ID: task",
  ":END:",
  "body",
  "",
].join("\n");

const logger = createTidyLogger({ level: "silent" });

function createMode(text = TEXT) {
  const host = new MemoryAnnotationHost();
  const session = new TidySession({ host, logger, config: resolveTidyConfig() });
  const source = { text, getText: (): string => source.text };
  const mode = new TidyMode({ session, source, parse: parseDocument });
  return { host, session, source, mode };
}

describe("TidyMode", () => {
  it("should tidy on enable and restore on disable", () => {
    const { host, mode, session } = createMode();

    const report = mode.enable();

    expect(mode.isActive).toBe(true);
    expect(report).toEqual({ regions: 2, decorated: 2, skipped: 0, created: 4 });
    expect(host.size).toBe(4);

    mode.disable();

    expect(mode.isActive).toBe(false);
    expect(session.registry.size).toBe(0);
    expect(host.size).toBe(0);
  });

  it("should re-tidy on save only while active", () => {
    const { mode, source, host } = createMode("* Task\nbody\n");

    expect(mode.handleSave()).toBeNull();
    mode.enable();
    expect(host.size).toBe(0);

    source.text = "* Task\n:PROPERTIES:\n:ID: x\n:END:\nbody\n";
    expect(mode.handleSave()).toEqual({ regions: 1, decorated: 1, skipped: 0, created: 3 });
    expect(mode.handleSave()).toEqual({ regions: 1, decorated: 0, skipped: 1, created: 0 });
  });

  it("should rebuild on save when the host reports moved annotations", () => {
    const host = new MemoryAnnotationHost();
    const session = new TidySession({ host, logger, config: resolveTidyConfig() });
    let moved = false;
    const mode = new TidyMode({
      session,
      source: { getText: () => TEXT },
      parse: parseDocument,
      needsRefresh: () => moved,
    });
    mode.enable();
    const before = session.records().map((record) => record.handle.id);

    moved = true;
    const report = mode.handleSave();

    expect(report).toEqual({ regions: 2, decorated: 2, skipped: 0, created: 4 });
    expect(host.size).toBe(4);
    expect(session.records().some((record) => before.includes(record.handle.id))).toBe(false);
  });

  it("should toggle between tidy and untidy", () => {
    const { mode, session } = createMode();

    mode.toggle();
    expect(session.isTidy).toBe(true);

    mode.toggle();
    expect(session.isTidy).toBe(false);
  });

  it("should rebuild decorations on refresh", () => {
    const { mode, session } = createMode();
    mode.enable();
    const before = session.records().map((record) => record.handle.id);

    mode.refresh();

    const after = session.records().map((record) => record.handle.id);
    expect(after).toHaveLength(before.length);
    expect(after.some((id) => before.includes(id))).toBe(false);
  });

  it("should keep sessions of different documents independent", () => {
    const first = createMode();
    const second = createMode();

    first.mode.enable();

    expect(first.session.registry.size).toBe(4);
    expect(second.session.registry.size).toBe(0);
    second.mode.disable();
    expect(first.host.size).toBe(4);
  });

  it("should apply a new config on the next pass", () => {
    const { mode, session } = createMode();
    session.setConfig(resolveTidyConfig({ topStyle: "keep" }));

    mode.enable();

    expect(session.registry.count("visual")).toBe(1);
    expect(session.getConfig().topStyle).toBe("keep");
  });
});
