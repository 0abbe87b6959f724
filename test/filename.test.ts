import { describe, expect, it } from "vitest";
import {
  LIVE_PLACEHOLDERS,
  buildLiveFileName,
  buildVodFileName,
  escapeTitle,
  findUnknownPlaceholders,
  formatTime,
  parseChzzkDate,
  renderTemplate
} from "../src/core/filename.js";

describe("buildLiveFileName", () => {
  it("renders the default template", () => {
    const name = buildLiveFileName({
      template: "[{username}]{stream_started}_{escaped_title}.ts",
      timeFormat: "yy-MM-dd HH_mm_ss",
      username: "foo",
      title: "hello world",
      streamStartedAt: new Date(2024, 0, 1, 10, 0, 0),
      recordStartedAt: new Date(2024, 0, 1, 10, 0, 7)
    });

    expect(name).toBe("[foo]24-01-01 10_00_00_hello world.ts");
  });

  it("fills record_started separately from stream_started", () => {
    const name = buildLiveFileName({
      template: "{record_started}-{stream_started}.ts",
      timeFormat: "HH_mm_ss",
      username: "foo",
      title: "t",
      streamStartedAt: new Date(2024, 0, 1, 10, 0, 0),
      recordStartedAt: new Date(2024, 0, 1, 10, 0, 7)
    });

    expect(name).toBe("10_00_07-10_00_00.ts");
  });

  it("keeps path separators in the display name out of the file name", () => {
    const name = buildLiveFileName({
      template: "[{username}]{escaped_title}.ts",
      timeFormat: "HH_mm_ss",
      username: "a/b:c",
      title: "t",
      streamStartedAt: new Date(2024, 0, 1, 10, 0, 0),
      recordStartedAt: new Date(2024, 0, 1, 10, 0, 0)
    });

    expect(name).toBe("[a_b_c]t.ts");
  });
});

describe("buildVodFileName", () => {
  const base = {
    template: "{stream_started}|{uploaded}|{download_started}",
    timeFormat: "MM-dd",
    username: "foo",
    title: "t",
    downloadStartedAt: new Date(2024, 5, 3),
    uploadedAt: new Date(2024, 5, 2)
  };

  it("uses the broadcast start when the video was a live stream", () => {
    expect(buildVodFileName({ ...base, streamStartedAt: new Date(2024, 5, 1) })).toBe("06-01|06-02|06-03");
  });

  it("falls back to the upload time otherwise", () => {
    expect(buildVodFileName({ ...base, streamStartedAt: null })).toBe("06-02|06-02|06-03");
  });

  it("sanitises the channel name", () => {
    expect(
      buildVodFileName({ ...base, template: "{username}-{uploaded}", username: "../x", streamStartedAt: null })
    ).toBe(".._x-06-02");
  });
});

describe("escapeTitle", () => {
  it("replaces characters that are unsafe in file names", () => {
    expect(escapeTitle("a/b\\c?d%e*f:g|h\"i<j>k.l{m}n")).toBe("a_b_c_d_e_f_g_h_i_j_k_l_m_n");
    expect(escapeTitle("line1\nline2")).toBe("line1_line2");
  });

  it("shortens long titles", () => {
    expect(escapeTitle("x".repeat(77))).toBe("x".repeat(77));
    expect(escapeTitle("x".repeat(78))).toBe(`${"x".repeat(75)}..`);
  });
});

describe("renderTemplate", () => {
  it("keeps unknown placeholders verbatim", () => {
    expect(renderTemplate("{username}-{nope}.ts", { username: "foo" })).toBe("foo-{nope}.ts");
  });

  it("lists unknown placeholders once each", () => {
    expect(findUnknownPlaceholders("{a}{username}{a}{b}", LIVE_PLACEHOLDERS)).toEqual(["a", "b"]);
  });
});

describe("dates", () => {
  it("formats with date-fns patterns", () => {
    expect(formatTime(new Date(2024, 0, 2, 3, 4, 5), "yy-MM-dd HH:mm:ss")).toBe("24-01-02 03:04:05");
  });

  it("parses Chzzk timestamps as local time", () => {
    expect(parseChzzkDate("2024-01-02 03:04:05")).toEqual(new Date(2024, 0, 2, 3, 4, 5));
    expect(parseChzzkDate("yesterday")).toBeNull();
  });
});
