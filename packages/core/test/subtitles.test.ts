import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  parseSubtitleBlocks,
  parseSubtitles,
  readSubtitleFile,
  stripMarkupTags,
} from "../src/text/subtitles";
import { CaptionFileError, isDigestError } from "../src/errors";

const SAMPLE_SRT = [
  "1",
  "00:00:00,000 --> 00:00:03,500",
  "Hello, welcome to this video.",
  "",
  "2",
  "00:00:03,500 --> 00:00:07,000",
  "Today we look at caption files.",
  "",
  "3",
  "00:00:07,000 --> 00:00:12,000",
  '<font color="white">Specifically, how to parse them.</font>',
  "",
].join("\n");

test("parses SRT blocks with index lines", () => {
  const segs = parseSubtitles(SAMPLE_SRT);
  assert.equal(segs.length, 3);
  assert.deepEqual(segs[0], { start: 0, end: 3.5, text: "Hello, welcome to this video." });
  assert.equal(segs[2].text, "Specifically, how to parse them.");
  assert.equal(segs[2].start, 7);
  assert.equal(segs[2].end, 12);
});

test("tag stripped from second block, arrow without spaces", () => {
  const input = "1\n00:00:00,000 --> 00:00:03,500\nHello\n\n2\n00:00:03,500-->00:00:07,000\n<font>World</font>";
  const segs = parseSubtitles(input);
  assert.equal(segs.length, 2);
  assert.equal(segs[1].text, "World");
  assert.equal(segs[1].start, 3.5);
});

test("parses WebVTT with dot separator, cue settings and inline timing tags", () => {
  const vtt = [
    "WEBVTT",
    "",
    "00:00:01.250 --> 00:00:04.000 align:start position:0%",
    "<c.colorE5E5E5>so<00:00:01.500><c> this</c></c>",
    "",
    "01:02:03.500 --> 01:02:05.000",
    "<v Speaker>late line",
  ].join("\n");
  const segs = parseSubtitles(vtt);
  assert.equal(segs.length, 2);
  assert.deepEqual(segs[0], { start: 1.25, end: 4, text: "so this" });
  assert.equal(segs[1].start, 3723.5);
  assert.equal(segs[1].text, "late line");
});

test("multi-line cue text is joined with single spaces", () => {
  const segs = parseSubtitles("00:00:00,000 --> 00:00:02,000\n  first line \nsecond line\n");
  assert.equal(segs.length, 1);
  assert.equal(segs[0].text, "first line second line");
});

test("blocks without timing or without text are skipped and counted", () => {
  const input = [
    "1",
    "not a timing line",
    "text",
    "",
    "2",
    "00:00:01,000 --> 00:00:02,000",
    "",
    "3",
    "00:00:02,000 --> 00:00:03,000",
    "<i></i>",
    "",
    "4",
    "00:00:03,000 --> 00:00:04,000",
    "kept",
  ].join("\n");
  const { segments, skippedBlocks } = parseSubtitleBlocks(input);
  assert.deepEqual(segments, [{ start: 3, end: 4, text: "kept" }]);
  assert.equal(skippedBlocks, 3);
});

test("returns no segments when no block has a timing line", () => {
  assert.deepEqual(parseSubtitles("WEBVTT\n\nNOTE nothing here\n\njust text"), []);
  assert.deepEqual(parseSubtitles(""), []);
});

test("keeps file order without re-sorting", () => {
  const input = "00:00:10,000 --> 00:00:11,000\nlater\n\n00:00:01,000 --> 00:00:02,000\nearlier";
  assert.deepEqual(
    parseSubtitles(input).map((s) => s.text),
    ["later", "earlier"],
  );
});

test("handles BOM, CRLF line endings and invalid UTF-8 bytes", () => {
  const text = "\uFEFF1\r\n00:00:00,000 --> 00:00:01,000\r\nCafé\r\n\r\n2\r\n00:00:01,000 --> 00:00:02,000\r\nbad ";
  const bytes = Buffer.concat([Buffer.from(text, "utf8"), Buffer.from([0xff, 0xfe]), Buffer.from(" byte")]);
  const segs = parseSubtitles(bytes);
  assert.equal(segs.length, 2);
  assert.equal(segs[0].text, "Café");
  assert.equal(segs[1].text, "bad \uFFFD\uFFFD byte");
});

test("stripMarkupTags is idempotent", () => {
  for (const input of ["<b>bold</b>", "<<b>>x", "a <c.red>b</c> <00:00:01.000>c", "no tags", "1 < 2 > 0"]) {
    const once = stripMarkupTags(input);
    assert.equal(stripMarkupTags(once), once);
  }
  assert.equal(stripMarkupTags("<<b>>x"), ">x");
});

test("readSubtitleFile parses from disk", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "vdigest-subs-"));
  const file = path.join(dir, "captions.srt");
  await fs.writeFile(file, SAMPLE_SRT, "utf8");
  try {
    const segs = await readSubtitleFile(file);
    assert.equal(segs.length, 3);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test("readSubtitleFile fails hard on a missing file", async () => {
  const missing = path.join(os.tmpdir(), "vdigest-does-not-exist", "captions.srt");
  await assert.rejects(readSubtitleFile(missing), (err: unknown) => {
    if (!(err instanceof CaptionFileError)) return false;
    assert.ok(isDigestError(err, "CAPTION_FILE_UNREADABLE"));
    assert.equal(err.filePath, missing);
    return true;
  });
});
