import { describe, expect, it } from "vitest";
import { emitCliBanner, formatCliBannerLine, hasEmittedCliBanner } from "./banner.js";

describe("formatCliBannerLine", () => {
  it("fits name, version and tagline on one line", () => {
    expect(formatCliBannerLine("0.1.0", { columns: 120 })).toBe(
      "scan-tagger 0.1.0 - catalog metadata for your film scans",
    );
  });

  it("wraps the tagline on narrow terminals", () => {
    expect(formatCliBannerLine("0.1.0", { columns: 40 })).toBe(
      "scan-tagger 0.1.0\n  catalog metadata for your film scans",
    );
  });
});

describe("emitCliBanner", () => {
  it("stays quiet when output is not a terminal", () => {
    const lines: string[] = [];
    const write = (text: string) => lines.push(text);
    emitCliBanner("0.1.0", { argv: ["node", "scan-tagger"], isTty: false, write });

    expect(lines).toEqual([]);
    expect(hasEmittedCliBanner()).toBe(false);
  });

  it("stays quiet for --version and --help", () => {
    const lines: string[] = [];
    const write = (text: string) => lines.push(text);
    emitCliBanner("0.1.0", { argv: ["node", "scan-tagger", "-V"], isTty: true, write });
    emitCliBanner("0.1.0", { argv: ["node", "scan-tagger", "--help"], isTty: true, write });

    expect(lines).toEqual([]);
  });

  it("prints once per process", () => {
    const lines: string[] = [];
    const options = {
      argv: ["node", "scan-tagger", "1-1.jpg"],
      columns: 120,
      isTty: true,
      write: (t: string) => lines.push(t),
    };
    emitCliBanner("0.1.0", options);
    emitCliBanner("0.1.0", options);

    expect(lines).toEqual(["\nscan-tagger 0.1.0 - catalog metadata for your film scans\n\n"]);
    expect(hasEmittedCliBanner()).toBe(true);
  });
});
