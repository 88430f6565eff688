import { describe, expect, it } from "vitest";
import { parseResponse } from "../parser/response-parser.js";

describe("response parser", () => {
  it("reads a reply that is a single JSON call", () => {
    const raw = '{"tool": "read_file", "parameters": {"file_path": "notes.txt"}}';
    const parsed = parseResponse(raw);

    expect(parsed.stage).toBe("whole");
    expect(parsed.toolCalls).toEqual([
      {
        id: "call_1",
        name: "read_file",
        arguments: { file_path: "notes.txt" },
        span: { start: 0, end: raw.length, stage: "whole" }
      }
    ]);
    expect(parsed.remainder).toBe("");
    expect(parsed.diagnostics).toEqual([]);
  });

  it("reads every fenced block in order and keeps the prose", () => {
    const raw = [
      "I'll create the directory and the file.",
      "```json",
      '{"tool": "create_directory", "parameters": {"dir_path": "out"}}',
      "```",
      "```json",
      '{"tool": "write_file", "parameters": {"file_path": "out/hello.txt", "content": "hi"}}',
      "```"
    ].join("\n");

    const parsed = parseResponse(raw);

    expect(parsed.stage).toBe("fenced");
    expect(parsed.toolCalls.map((call) => [call.id, call.name, call.arguments])).toEqual([
      ["call_1", "create_directory", { dir_path: "out" }],
      ["call_2", "write_file", { file_path: "out/hello.txt", content: "hi" }]
    ]);
    expect(parsed.remainder).toBe("I'll create the directory and the file.");
  });

  it("falls back to brace spans inside prose", () => {
    const parsed = parseResponse('Sure. {"name": "list_directory", "arguments": {"dir_path": "."}} Done.');

    expect(parsed.stage).toBe("braces");
    expect(parsed.toolCalls).toHaveLength(1);
    expect(parsed.toolCalls[0]?.name).toBe("list_directory");
    expect(parsed.toolCalls[0]?.arguments).toEqual({ dir_path: "." });
    expect(parsed.toolCalls[0]?.span).toEqual({ start: 6, end: 64, stage: "braces" });
    expect(parsed.remainder).toBe("Sure.  Done.");
  });

  it("repairs single quotes and trailing commas inside a fence", () => {
    const parsed = parseResponse("```json\n{'tool': 'read_file', 'parameters': {'file_path': 'a.txt',},}\n```");

    expect(parsed.stage).toBe("fenced");
    expect(parsed.toolCalls[0]?.name).toBe("read_file");
    expect(parsed.toolCalls[0]?.arguments).toEqual({ file_path: "a.txt" });
    expect(parsed.diagnostics).toEqual([]);
  });

  it("closes a call cut off at the end of the reply", () => {
    const parsed = parseResponse('{"tool": "list_directory", "parameters": {"dir_path": "src"}');

    expect(parsed.stage).toBe("whole");
    expect(parsed.toolCalls[0]?.arguments).toEqual({ dir_path: "src" });
  });

  it("returns plain answers untouched", () => {
    expect(parseResponse("Done, no changes needed.")).toEqual({
      toolCalls: [],
      remainder: "Done, no changes needed.",
      diagnostics: [],
      stage: null
    });
  });

  it("reports malformed candidates as diagnostics without throwing", () => {
    const raw = 'Here: {"tool": "read_file", "parameters": {"file_path": }}';
    const parsed = parseResponse(raw);

    expect(parsed.toolCalls).toEqual([]);
    expect(parsed.remainder).toBe(raw);
    expect(parsed.diagnostics).toHaveLength(1);
    expect(parsed.diagnostics[0]?.code).toBe("parse_failed");
    expect(parsed.diagnostics[0]?.span).toEqual({ start: 6, end: raw.length, stage: "braces" });
    expect(parsed.diagnostics[0]?.repairs).toEqual([]);
  });

  it("records the repairs tried on a candidate that still fails", () => {
    const parsed = parseResponse("{{{{");

    expect(parsed.toolCalls).toEqual([]);
    expect(parsed.diagnostics).toHaveLength(1);
    expect(parsed.diagnostics[0]?.excerpt).toBe("{{{{");
    expect(parsed.diagnostics[0]?.repairs).toEqual(["closeUnterminatedStructure"]);
  });

  it("flags objects that name no tool", () => {
    const parsed = parseResponse('{"parameters": {"x": 1}}');

    expect(parsed.toolCalls).toEqual([]);
    expect(parsed.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["missing_tool_name"]);
  });

  it("flags arguments that are not an object", () => {
    const parsed = parseResponse('{"tool": "read_file", "parameters": [1, 2]}');

    expect(parsed.toolCalls).toEqual([]);
    expect(parsed.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["invalid_arguments_shape"]);
  });

  it("reads arrays of calls and the common key spellings", () => {
    const parsed = parseResponse('[{"tool": "a"}, {"tool_name": "b", "args": {"x": 1}}]');

    expect(parsed.toolCalls.map((call) => [call.name, call.arguments])).toEqual([
      ["a", {}],
      ["b", { x: 1 }]
    ]);
  });

  it("decodes function-style calls with string arguments", () => {
    const parsed = parseResponse(
      JSON.stringify({ function: { name: "read_file", arguments: JSON.stringify({ file_path: "a.txt" }) } })
    );

    expect(parsed.toolCalls[0]?.name).toBe("read_file");
    expect(parsed.toolCalls[0]?.arguments).toEqual({ file_path: "a.txt" });
  });

  it("stops at the first stage that recovers a call", () => {
    const parsed = parseResponse('Run {"tool": "a"}\n```json\n{"tool": "b"}\n```');

    expect(parsed.stage).toBe("fenced");
    expect(parsed.toolCalls.map((call) => call.name)).toEqual(["b"]);
    expect(parsed.remainder).toBe('Run {"tool": "a"}');
  });

  it("finds calls inside fences that also hold prose", () => {
    const raw = '```\ncall: {"tool": "x"}\n```';
    const parsed = parseResponse(raw);

    expect(parsed.stage).toBe("fenced");
    expect(parsed.toolCalls[0]?.span).toEqual({ start: 10, end: 23, stage: "fenced" });
    expect(parsed.remainder).toBe("");
  });

  it("keeps code fences inside string arguments from splitting a block", () => {
    const readme = "# Docs\n```bash\nnpm i\n```\n";
    const raw = [
      "Setting up the docs.",
      "```json",
      JSON.stringify({ tool: "create_directory", parameters: { dir_path: "docs" } }),
      "```",
      "```json",
      JSON.stringify({ tool: "write_file", parameters: { file_path: "docs/README.md", content: readme } }),
      "```"
    ].join("\n");

    const parsed = parseResponse(raw);

    expect(parsed.stage).toBe("fenced");
    expect(parsed.toolCalls.map((call) => [call.name, call.arguments])).toEqual([
      ["create_directory", { dir_path: "docs" }],
      ["write_file", { file_path: "docs/README.md", content: readme }]
    ]);
    expect(parsed.diagnostics).toEqual([]);
    expect(parsed.remainder).toBe("Setting up the docs.");
  });

  it("drops a block with two defects and still runs its neighbours", () => {
    const raw = [
      "```json",
      '{"tool": "read_file", "parameters" {"file_path": "a.txt",}}',
      "```",
      "```json",
      '{"tool": "list_directory", "parameters": {}}',
      "```"
    ].join("\n");

    const parsed = parseResponse(raw);

    expect(parsed.stage).toBe("fenced");
    expect(parsed.toolCalls.map((call) => [call.id, call.name, call.arguments])).toEqual([
      ["call_1", "list_directory", {}]
    ]);
    expect(parsed.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["parse_failed"]);
    expect(parsed.diagnostics[0]?.span.start).toBe(8);
    expect(parsed.diagnostics[0]?.repairs).toEqual(["stripTrailingCommas"]);
  });

  it("uses the supplied id generator", () => {
    let next = 40;
    const parsed = parseResponse('[{"tool": "a"}, {"tool": "b"}]', {
      createId: () => {
        next += 1;
        return `call_${next}`;
      }
    });

    expect(parsed.toolCalls.map((call) => call.id)).toEqual(["call_41", "call_42"]);
  });
});
