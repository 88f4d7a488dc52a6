/**
 * Prompts for the content-analysis model. Every prompt asks for a bare JSON object;
 * responses still go through parseModelJson since the model does not always comply.
 */

export const DIGEST_SYSTEM = [
  "You analyze videos from their timestamped transcript and, when provided, screenshots.",
  "Produce the structured analysis requested by the user. Keep timestamps exactly as they appear in the transcript.",
  "Reply with a single JSON object only: no markdown fences, no commentary.",
].join("\n");

export const KEY_MOMENTS_SYSTEM = [
  "You find the moments in a video transcript where the content changes direction.",
  "Reply with a single JSON object only: no markdown fences, no commentary.",
].join("\n");

export const DIAGRAM_SYSTEM = [
  "You turn a video summary into a small knowledge graph of nodes and edges for a hand-drawn diagram.",
  "Reply with a single JSON object only: no markdown fences, no commentary.",
].join("\n");

function languageLine(language: string, subject: string): string {
  return `Write ${subject} in ${language}.`;
}

export interface DigestPromptOpts {
  title: string;
  /** Transcript lines as produced by segmentsToText */
  transcript: string;
  language: string;
  /** Number of screenshots attached to the request */
  imageCount?: number;
  /** 1-based part number when the transcript is split across several calls */
  part?: { index: number; total: number } | null;
}

export function buildDigestPrompt(opts: DigestPromptOpts): string {
  const lines = [`Video title: ${opts.title}`, ""];

  if (opts.part && opts.part.total > 1) {
    lines.push(
      `This is part ${opts.part.index} of ${opts.part.total} of the transcript. Cover only this part.`,
      "",
    );
  }

  lines.push("Transcript (each line starts with [MM:SS] or [HH:MM:SS]):", opts.transcript, "");

  if (opts.imageCount && opts.imageCount > 0) {
    lines.push(
      `${opts.imageCount} screenshot(s) from this part of the video are attached in chronological order. Use what is visible on screen where it adds detail.`,
      "",
    );
  }

  lines.push(
    languageLine(opts.language, "every output field"),
    "",
    "Return a JSON object with exactly these fields:",
    "{",
    '  "overview": "1-2 sentences: the central thesis of the video and why it matters, not a list of sections",',
    '  "key_points": ["short, self-contained takeaway", "..."],',
    '  "chapters": [',
    "    {",
    '      "title": "chapter title",',
    '      "timestamp": "[MM:SS] copied from the transcript",',
    '      "start_seconds": 0,',
    '      "summary": "80-100 words on the concrete arguments, examples and data in this chapter"',
    "    }",
    "  ]",
    "}",
    "",
    "Rules:",
    "- 4-8 chapters at natural topic transitions, in chronological order.",
    "- 3-8 key points; do not repeat the overview.",
    "- Do not repeat the same sentence or point across fields.",
  );

  return lines.join("\n");
}

export interface KeyMomentsPromptOpts {
  title: string;
  transcript: string;
  count: number;
}

export function buildKeyMomentsPrompt(opts: KeyMomentsPromptOpts): string {
  return [
    `Video title: ${opts.title}`,
    "",
    "Transcript:",
    opts.transcript,
    "",
    `Pick exactly ${opts.count} moments where the topic, argument or on-screen context clearly shifts,`,
    "such as the start of a new demonstration, example or section.",
    "",
    "Return JSON:",
    '{"key_moments": [{"seconds": 0, "label": "brief label"}]}',
  ].join("\n");
}

export interface DiagramPromptOpts {
  title: string;
  overview: string;
  chapterTitles: string[];
  language: string;
}

export function buildDiagramPrompt(opts: DiagramPromptOpts): string {
  return [
    `Video title: ${opts.title}`,
    "",
    `Overview: ${opts.overview}`,
    "",
    "Chapters:",
    ...opts.chapterTitles.map((t) => `- ${t}`),
    "",
    languageLine(opts.language, "every node label"),
    "",
    "Return a JSON object:",
    "{",
    '  "nodes": [{"id": "root", "label": "core thesis, 8-12 words", "type": "core"},',
    '            {"id": "p1", "label": "phase heading, 3-5 words", "type": "phase"},',
    '            {"id": "p1a", "label": "concrete insight, 10-15 words", "type": "insight"}],',
    '  "edges": [{"from": "root", "to": "p1"}, {"from": "p1", "to": "p1a"}]',
    "}",
    "",
    "Rules:",
    '- Exactly one "core" node, 3-4 "phase" nodes linked from it, 2-3 "insight" nodes per phase.',
    "- Insight labels are complete thoughts, not topic words.",
    "- Labels stay under 80 characters and contain no double quotes or backslashes.",
  ].join("\n");
}
