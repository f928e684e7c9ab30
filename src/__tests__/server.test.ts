import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { promises } from "fs";
import os from "os";
import path from "path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResult, CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createServer } from "../server.js";
import { execFfmpeg, extractSubtitleStream, getDimensions, hasVideoStream, probeStreams } from "../ffmpeg.js";
import { trackUri } from "../resources.js";
import { trackIdFor } from "../io.js";

vi.mock("../ffmpeg.js", () => ({
  probeStreams: vi.fn(),
  extractSubtitleStream: vi.fn(),
  getDimensions: vi.fn(),
  execFfmpeg: vi.fn(),
  hasVideoStream: vi.fn(),
  renderCaptionFrame: vi.fn(),
}));

const VIDEO = "/videos/Server Test.mkv";
const TRACK_ID = trackIdFor(VIDEO, 0);
const DIALOGUE_VIDEO = "/videos/Two Speakers.mkv";

const SRT = [
  "1\n00:00:01,000 --> 00:00:02,000\nGood morning.",
  "2\n00:00:02,500 --> 00:00:04,000\nIs there any coffee left?",
  "3\n00:00:04,500 --> 00:00:06,000\nOnly decaf, sorry.",
].join("\n\n");

// Two speakers sharing one timing
const DIALOGUE_SRT = [
  "1\n00:00:01,000 --> 00:00:03,000\nAna: Where?",
  "2\n00:00:01,000 --> 00:00:03,000\nBen: Here!",
].join("\n\n");

function textOf(result: CallToolResult): string {
  return result.content.map(item => item.type === "text" ? item.text : "").join("");
}

describe("MCP server", () => {
  let client: Client;
  let workDir: string;
  let renderedAss = "";

  async function callTool(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    return CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  }

  beforeAll(async () => {
    workDir = await promises.mkdtemp(path.join(os.tmpdir(), "sub2clip-server-"));

    vi.mocked(probeStreams).mockResolvedValue([
      { index: 0, codec_type: "video" },
      { index: 1, codec_type: "subtitle", tags: { language: "eng" } },
    ]);
    vi.mocked(extractSubtitleStream).mockImplementation(async (input: string, output: string) => {
      await promises.writeFile(output, input === DIALOGUE_VIDEO ? DIALOGUE_SRT : SRT, "utf-8");
    });
    vi.mocked(getDimensions).mockResolvedValue({ width: 1920, height: 1080 });
    vi.mocked(hasVideoStream).mockResolvedValue(true);
    vi.mocked(execFfmpeg).mockImplementation(async (args: string[]) => {
      // The ASS file only lives in a temp directory while ffmpeg renders
      const assMatch = args.includes("-filter_complex")
        ? /subtitles='([^']+)'/.exec(args[args.indexOf("-filter_complex") + 1])
        : null;
      if (assMatch) {
        renderedAss = await promises.readFile(assMatch[1], "utf-8");
      }
      await promises.writeFile(args[args.length - 1], Buffer.alloc(2048));
      return "";
    });

    const server = createServer();
    client = new Client({ name: "test-client", version: "1.0.0" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([
      client.connect(clientTransport),
      server.connect(serverTransport),
    ]);
  });

  afterAll(async () => {
    await client.close();
  });

  it("lists the tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map(tool => tool.name)).toEqual([
      "extract_subtitles",
      "get_subtitles",
      "search_subtitles",
      "resolve_time_range",
      "generate_clip",
    ]);
    expect(tools[0].inputSchema.required).toEqual(["videoPath"]);
  });

  it("extracts a subtitle track by language and reports progress", async () => {
    const progress: number[] = [];

    const result = CallToolResultSchema.parse(await client.callTool(
      { name: "extract_subtitles", arguments: { videoPath: VIDEO, languages: ["eng"] } },
      CallToolResultSchema,
      { onprogress: ({ progress: value }) => { progress.push(value); } }
    ));

    expect(result.structuredContent).toEqual({
      track_id: TRACK_ID,
      video_path: VIDEO,
      stream: 0,
      language: "eng",
      subtitles_count: 3,
      next_action: { tool: "search_subtitles", parameters: { trackId: TRACK_ID } },
    });
    expect(progress).toEqual([0, 1, 2, 3]);
  });

  it("returns the stored track as SubRip", async () => {
    const result = await callTool("get_subtitles", { trackId: TRACK_ID, format: "srt" });

    expect(textOf(result)).toBe(
      "1\n00:00:01,000 --> 00:00:02,000\nGood morning.\n\n" +
      "2\n00:00:02,500 --> 00:00:04,000\nIs there any coffee left?\n\n" +
      "3\n00:00:04,500 --> 00:00:06,000\nOnly decaf, sorry.\n"
    );
  });

  it("searches the track", async () => {
    const result = await callTool("search_subtitles", { trackId: TRACK_ID, query: "COFFEE" });

    expect(result.structuredContent).toEqual({
      track_id: TRACK_ID,
      query: "COFFEE",
      total_matches: 1,
      matches: [{ index: 1, start: 2500, end: 4000, lines: ["Is there any coffee left?"], label: "[2s - 4s] Is there any coffee left?" }],
    });
  });

  it("resolves a chained time range", async () => {
    const result = await callTool("resolve_time_range", { trackId: TRACK_ID, index: 1, count: 2 });

    expect(result.structuredContent).toMatchObject({ start: 2500, end: 6000, duration: 3500 });
  });

  it("generates a clip from a quote", async () => {
    const outputPath = path.join(workDir, "quote.gif");

    const result = await callTool("generate_clip", {
      videoPath: VIDEO,
      trackId: TRACK_ID,
      query: "coffee",
      burnSubtitles: true,
      outputPath,
      clipPath: path.join(workDir, "clip.mp4"),
    });

    expect(result.structuredContent).toEqual({
      output_path: outputPath,
      size_bytes: 2048,
      width: 568,
      height: 320,
      start: 2500,
      end: 4000,
      duration: 1500,
    });
    expect(getDimensions).toHaveBeenCalledWith(VIDEO);
  });

  it("burns in every line sharing the timing of a delayed subtitle", async () => {
    await callTool("extract_subtitles", { videoPath: DIALOGUE_VIDEO });

    const result = await callTool("generate_clip", {
      videoPath: DIALOGUE_VIDEO,
      trackId: trackIdFor(DIALOGUE_VIDEO, 0),
      index: 0,
      delay: 200,
      burnSubtitles: true,
      outputPath: path.join(workDir, "dialogue.gif"),
      clipPath: path.join(workDir, "dialogue.mp4"),
    });

    expect(result.structuredContent).toMatchObject({ start: 1200, end: 3000 });
    expect(renderedAss.split("\n").filter(line => line.startsWith("Dialogue:"))).toEqual([
      "Dialogue: 0,0:00:00.00,0:00:01.80,subtitle_style,,0,0,10,,Ana: Where?",
      "Dialogue: 0,0:00:00.00,0:00:01.80,subtitle_style,,0,0,10,,Ben: Here!",
    ]);
  });

  it("rejects a subtitle track the video does not have", async () => {
    await expect(client.callTool({ name: "extract_subtitles", arguments: { videoPath: VIDEO, track: 3 } }))
      .rejects.toThrow(/Subtitle track 3 does not exist/);
  });

  it("reports a missing track as a structured error", async () => {
    await expect(client.callTool({ name: "get_subtitles", arguments: { trackId: "missing.s9" } }))
      .rejects.toThrow(/subtitles_not_found/);
  });

  it("rejects invalid arguments", async () => {
    await expect(client.callTool({ name: "search_subtitles", arguments: { query: "coffee" } }))
      .rejects.toThrow(/invalid_arguments/);
  });

  it("exposes stored tracks as resources", async () => {
    const { resources } = await client.listResources();
    const uri = trackUri(TRACK_ID);
    expect(resources.map(resource => resource.uri)).toContain(uri);

    const { contents } = await client.readResource({ uri });
    const [content] = contents;
    expect(content.uri).toBe(uri);
    expect(typeof content.text === "string" ? JSON.parse(content.text).track_id : undefined).toBe(TRACK_ID);
  });

  it("refuses resources outside the subtitles folder", async () => {
    await expect(client.readResource({ uri: "file:///etc/passwd" })).rejects.toThrow(/Resource not found/);
  });

  it("serves the clip_from_quote prompt", async () => {
    const { prompts } = await client.listPrompts();
    expect(prompts.map(prompt => prompt.name)).toEqual(["clip_from_quote"]);

    const prompt = await client.getPrompt({ name: "clip_from_quote", arguments: { videoPath: VIDEO, quote: "any coffee" } });
    const [message] = prompt.messages;
    expect(message.role).toBe("user");
    expect(message.content.type === "text" ? message.content.text : "").toContain(`Call extract_subtitles with videoPath "${VIDEO}"`);
  });
});
